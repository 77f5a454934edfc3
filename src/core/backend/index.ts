import { isAtLeastAsSevere, Level } from "../level/index.js";
import type { LogRecord } from "../record/index.js";
import type { LeveledBackend, Sink } from "../types.js";

const DEFAULT_MODULE = "";

export function isLeveledBackend(value: unknown): value is LeveledBackend {
  return (
    typeof value === "object" &&
    value !== null &&
    "isEnabledFor" in value &&
    typeof value.isEnabledFor === "function" &&
    "setLevel" in value &&
    typeof value.setLevel === "function" &&
    "getLevel" in value &&
    typeof value.getLevel === "function"
  );
}

/**
 * Gates records by a per-module threshold table before forwarding them to a
 * sink. Module names are dot-delimited; a lookup walks from the full name
 * towards the root, and the empty module holds the default.
 */
export class ModuleLevelBackend implements LeveledBackend {
  // Replaced on every write; readers always see a complete table.
  private levels: ReadonlyMap<string, Level> = new Map();

  public constructor(private readonly sink: Sink) {}

  public async log(
    level: Level,
    calldepth: number,
    record: LogRecord,
  ): Promise<void> {
    await this.sink.log(level, calldepth + 1, record);
  }

  public isEnabledFor(level: Level, module: string): boolean {
    const threshold = this.resolve(module);
    if (threshold === undefined) {
      return true;
    }
    return isAtLeastAsSevere(level, threshold);
  }

  public setLevel(level: Level, module: string): void {
    const next = new Map(this.levels);
    next.set(module, level);
    this.levels = next;
  }

  public getLevel(module: string): Level {
    return this.resolve(module) ?? Level.DEBUG;
  }

  public getLevels(): ReadonlyMap<string, Level> {
    return this.levels;
  }

  private resolve(module: string): Level | undefined {
    const levels = this.levels;
    let candidate = module;
    for (;;) {
      const level = levels.get(candidate);
      if (level !== undefined) {
        return level;
      }
      if (candidate === DEFAULT_MODULE) {
        return undefined;
      }
      const separator = candidate.lastIndexOf(".");
      candidate = separator >= 0 ? candidate.slice(0, separator) : DEFAULT_MODULE;
    }
  }
}

/**
 * Wraps `sink` with a module threshold table, unless it already has one.
 */
export function addModuleLevel(sink: Sink | LeveledBackend): LeveledBackend {
  if (isLeveledBackend(sink)) {
    return sink;
  }
  return new ModuleLevelBackend(sink);
}

/**
 * Resolves its target on every call, so a logger bound early follows later
 * replacements of the default backend.
 */
export class LeveledBackendProxy implements LeveledBackend {
  public constructor(private readonly get: () => LeveledBackend) {}

  public log(level: Level, calldepth: number, record: LogRecord): Promise<void> {
    return this.get().log(level, calldepth + 1, record);
  }

  public isEnabledFor(level: Level, module: string): boolean {
    return this.get().isEnabledFor(level, module);
  }

  public setLevel(level: Level, module: string): void {
    this.get().setLevel(level, module);
  }

  public getLevel(module: string): Level {
    return this.get().getLevel(module);
  }
}
