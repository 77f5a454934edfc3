// Ordered from most to least severe.
export enum Level {
  CRITICAL,
  ERROR,
  WARNING,
  NOTICE,
  INFO,
  DEBUG,
}

export type LevelName = keyof typeof Level;

export const LEVELS: readonly Level[] = [
  Level.CRITICAL,
  Level.ERROR,
  Level.WARNING,
  Level.NOTICE,
  Level.INFO,
  Level.DEBUG,
];

const LEVEL_NAMES: Record<Level, LevelName> = {
  [Level.CRITICAL]: "CRITICAL",
  [Level.ERROR]: "ERROR",
  [Level.WARNING]: "WARNING",
  [Level.NOTICE]: "NOTICE",
  [Level.INFO]: "INFO",
  [Level.DEBUG]: "DEBUG",
};

export function levelName(level: Level): LevelName {
  return LEVEL_NAMES[level];
}

export function isLevel(value: unknown): value is Level {
  return LEVELS.some((level) => level === value);
}

/**
 * True when `level` is at least as severe as `threshold`.
 */
export function isAtLeastAsSevere(level: Level, threshold: Level): boolean {
  return level <= threshold;
}
