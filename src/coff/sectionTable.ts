import { CoffError } from "./errors";
import { CoffSection } from "./section";

/**
 * Ordered, name-indexed collection of the sections in an image
 */
export class CoffSectionTable implements Iterable<CoffSection> {
  private readonly sections: readonly CoffSection[];
  private readonly sectionsByName = new Map<string, CoffSection>();

  constructor(sections: CoffSection[]) {
    for (const section of sections) {
      if (this.sectionsByName.has(section.name)) {
        throw new CoffError("DUPLICATE_SECTION", section.name);
      }
      this.sectionsByName.set(section.name, section);
    }
    this.sections = [...sections];
  }

  get length(): number {
    return this.sections.length;
  }

  /**
   * Get section by position in the table
   */
  public byIndex(index: number): CoffSection {
    const section = Number.isInteger(index) ? this.sections[index] : undefined;
    if (!section) {
      throw new CoffError("SECTION_NOT_FOUND", `index ${index}`);
    }
    return section;
  }

  /**
   * Get section by exact name
   */
  public byName(name: string): CoffSection {
    const section = this.sectionsByName.get(name);
    if (!section) {
      throw new CoffError("SECTION_NOT_FOUND", `name ${name}`);
    }
    return section;
  }

  public has(name: string): boolean {
    return this.sectionsByName.has(name);
  }

  /**
   * Sections occupying target memory, in table order
   */
  public allocated(): CoffSection[] {
    return this.sections.filter((s) => s.allocated);
  }

  [Symbol.iterator](): Iterator<CoffSection> {
    return this.sections[Symbol.iterator]();
  }
}
