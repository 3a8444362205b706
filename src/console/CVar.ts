import { renderLogError } from "../core/renderLog.js";

export type CVarValue = number | boolean;
export type CVarType = "number" | "boolean";
export type CVarCategory = "cl" | "r";

interface CVarDescBase {
  name: string;
  description: string;
  category: CVarCategory;
}

export interface NumberCVarDesc extends CVarDescBase {
  type: "number";
  defaultValue: number;
  min?: number;
  max?: number;
}

export interface BooleanCVarDesc extends CVarDescBase {
  type: "boolean";
  defaultValue: boolean;
}

export type CVarDesc = NumberCVarDesc | BooleanCVarDesc;

/** How a CVar of one value type reads strings and normalizes values. */
interface CVarCodec<T extends CVarValue> {
  parse(str: string): T | undefined;
  normalize(value: T): T;
}

export class CVar<T extends CVarValue> {
  readonly name: string;
  readonly description: string;
  readonly type: CVarType;
  readonly category: CVarCategory;
  readonly defaultValue: T;
  private value: T;
  private listeners = new Set<(newVal: T, oldVal: T) => void>();

  constructor(
    desc: CVarDescBase & { type: CVarType },
    defaultValue: T,
    private readonly codec: CVarCodec<T>,
  ) {
    this.name = desc.name;
    this.description = desc.description;
    this.type = desc.type;
    this.category = desc.category;
    this.defaultValue = codec.normalize(defaultValue);
    this.value = this.defaultValue;
  }

  get(): T {
    return this.value;
  }

  set(raw: T): void {
    const v = this.codec.normalize(raw);
    if (v === this.value) return;
    const old = this.value;
    this.value = v;
    for (const cb of this.listeners) {
      try {
        cb(v, old);
      } catch (e) {
        renderLogError(`[cvar] onChange error for ${this.name}`, e);
      }
    }
  }

  reset(): void {
    this.set(this.defaultValue);
  }

  onChange(cb: (newVal: T, oldVal: T) => void): () => void {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  /** Parse a string value into the correct type and set it. Returns false if it didn't parse. */
  setFromString(str: string): boolean {
    const v = this.codec.parse(str.trim());
    if (v === undefined) return false;
    this.set(v);
    return true;
  }
}

export type AnyCVar = CVar<number> | CVar<boolean>;

function numberCodec(min: number | undefined, max: number | undefined): CVarCodec<number> {
  return {
    parse(str) {
      if (str === "") return undefined;
      const n = Number(str);
      return Number.isNaN(n) ? undefined : n;
    },
    normalize(v) {
      let out = v;
      if (min != null) out = Math.max(min, out);
      if (max != null) out = Math.min(max, out);
      return out;
    },
  };
}

const booleanCodec: CVarCodec<boolean> = {
  parse(str) {
    if (str === "1" || str === "true") return true;
    if (str === "0" || str === "false") return false;
    return undefined;
  },
  normalize: (v) => v,
};

export function createCVar(desc: NumberCVarDesc): CVar<number>;
export function createCVar(desc: BooleanCVarDesc): CVar<boolean>;
export function createCVar(desc: CVarDesc): AnyCVar;
export function createCVar(desc: CVarDesc): AnyCVar {
  switch (desc.type) {
    case "number":
      return new CVar(desc, desc.defaultValue, numberCodec(desc.min, desc.max));
    case "boolean":
      return new CVar(desc, desc.defaultValue, booleanCodec);
  }
}
