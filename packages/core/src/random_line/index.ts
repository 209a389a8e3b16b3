export { randomLine } from './random_line';
export { LineReservoir } from './line_reservoir';
export type { RandomLineOptions } from './random_line.types';
