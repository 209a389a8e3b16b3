/**
 * Options for randomLine.
 */
export interface RandomLineOptions {
  /** Source of floats in [0, 1). Default: Math.random */
  random?: () => number;
  /** Bytes read per chunk. Default: 65536 */
  chunkSize?: number;
}
