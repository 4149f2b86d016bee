// ============================================================================
// @textprobe/cli — Sample Inputs
// ============================================================================

/** Classified when no text is given on the command line. */
export const DEFAULT_TEXTS: readonly string[] = [
  'This product is amazing! I would buy it again.',
  'The delivery was late and the package arrived damaged.',
  'Stock markets close higher as tech shares rally',
  'Local team wins the championship after extra time',
  'Researchers announce a faster method for training small models',
];
