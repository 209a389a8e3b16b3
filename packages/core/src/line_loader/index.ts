export { loadLines, loadInts, splitLines, keepLine, parseInteger } from './line_loader';
