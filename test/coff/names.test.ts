import { CoffError, readString, resolveName } from "../../src";

describe("names", () => {
  describe("resolveName", () => {
    it("reads a full 8 byte inline name", () => {
      const buffer = Buffer.from("abcdefghXYZ");
      expect(resolveName(buffer, 0, true, 0, 0)).toBe("abcdefgh");
    });

    it("stops an inline name at NUL", () => {
      const buffer = Buffer.from("\0\0.bss\0\0\0\0", "latin1");
      expect(resolveName(buffer, 2, true, 0, 0)).toBe(".bss");
    });

    it("reads a name from the string table", () => {
      const buffer = Buffer.from("xxxx.long_name\0tail", "latin1");
      expect(resolveName(buffer, 0, false, 0, 4)).toBe(".long_name");
    });

    it("reads to the end of the buffer when there is no NUL", () => {
      const buffer = Buffer.from("xxxx.long_name\0tail", "latin1");
      expect(resolveName(buffer, 0, false, 11, 4)).toBe("tail");
    });

    it("returns undefined when the name starts at or past the end", () => {
      const buffer = Buffer.from("xxxx.name\0", "latin1");
      expect(resolveName(buffer, 0, false, 6, 4)).toBeUndefined();
      expect(resolveName(buffer, 0, false, 100, 4)).toBeUndefined();
    });

    it("decodes UTF-8", () => {
      const buffer = Buffer.from("sección\0", "utf8");
      expect(resolveName(buffer, 0, false, 0, 0)).toBe("sección");
    });

    it("keeps a leading byte order mark", () => {
      const buffer = Buffer.concat([
        Buffer.from([0xef, 0xbb, 0xbf]),
        Buffer.from(".data\0"),
      ]);
      const name = resolveName(buffer, 0, false, 0, 0);
      expect(name).toBe("\uFEFF.data");
      expect(name?.length).toBe(6);
    });
  });

  describe("readString", () => {
    it("raises an error for invalid UTF-8", () => {
      const data = Uint8Array.from([0x2e, 0xff, 0xfe, 0]);
      expect(() => readString(data)).toThrow(CoffError);
      let err: unknown;
      try {
        readString(data);
      } catch (e) {
        err = e;
      }
      expect(err).toMatchObject({ errorType: "INVALID_NAME_ENCODING" });
    });

    it("decodes an empty region", () => {
      expect(readString(new Uint8Array(0))).toBe("");
    });
  });
});
