/**
 * Current langsense version.
 * Increment MAJOR when the snapshot root layout changes incompatibly.
 */
export const LANGSENSE_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;
