import {
  type AnyCVar,
  type BooleanCVarDesc,
  type CVar,
  type CVarCategory,
  type CVarDesc,
  createCVar,
  type NumberCVarDesc,
} from "./CVar.js";

export class CVarRegistry {
  private cvars = new Map<string, AnyCVar>();

  register(desc: NumberCVarDesc): CVar<number>;
  register(desc: BooleanCVarDesc): CVar<boolean>;
  register(desc: CVarDesc): AnyCVar {
    if (this.cvars.has(desc.name)) {
      throw new Error(`[cvar] duplicate registration: ${desc.name}`);
    }
    const cv = createCVar(desc);
    this.cvars.set(desc.name, cv);
    return cv;
  }

  get(name: string): AnyCVar | undefined {
    return this.cvars.get(name);
  }

  getAll(): AnyCVar[] {
    return [...this.cvars.values()];
  }

  getByCategory(category: CVarCategory): AnyCVar[] {
    return this.getAll().filter((cv) => cv.category === category);
  }

  getNames(): string[] {
    return [...this.cvars.keys()];
  }

  /** Set a cvar by name from console text. False for unknown names or unparseable values. */
  setFromString(name: string, value: string): boolean {
    return this.cvars.get(name)?.setFromString(value) ?? false;
  }

  resetAll(): void {
    for (const cv of this.cvars.values()) cv.reset();
  }
}
