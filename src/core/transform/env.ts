// src/core/transform/env.ts
// Lexical binding environment: immutable frames, shared fresh-name supply.

import { HOST_RESERVED, mangle } from "./mangle";

/**
 * Hands out host identifiers for one compilation. A name already handed out
 * gets a `$n` suffix, which mangled user symbols can never contain.
 */
export class NameSupply {
  private readonly used: Set<string>;

  /** `reserved` names are never handed out, e.g. identifiers the evaluator passes in. */
  constructor(reserved: Iterable<string> = []) {
    this.used = new Set<string>([...Object.values(HOST_RESERVED), ...reserved]);
  }

  fresh(lispName: string): string {
    const base = mangle(lispName);
    if (!this.used.has(base)) {
      this.used.add(base);
      return base;
    }
    for (let n = 1; ; n++) {
      const candidate = `${base}$${n}`;
      if (!this.used.has(candidate)) {
        this.used.add(candidate);
        return candidate;
      }
    }
  }
}

export class Env {
  private constructor(
    private readonly name: string | null,
    private readonly host: string | null,
    private readonly parent: Env | null,
    readonly names: NameSupply
  ) {}

  static empty(names: NameSupply = new NameSupply()): Env {
    return new Env(null, null, null, names);
  }

  /** Host identifier bound to `name`, innermost frame first. */
  lookup(name: string): string | undefined {
    for (let e: Env | null = this; e; e = e.parent) {
      if (e.name === name && e.host !== null) return e.host;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** New environment with `name` bound; the receiver is left untouched. */
  bind(name: string): { env: Env; host: string } {
    const host = this.names.fresh(name);
    return { env: new Env(name, host, this, this.names), host };
  }
}
