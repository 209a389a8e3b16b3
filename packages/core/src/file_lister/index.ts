export { listFiles, keepFile } from './file_lister';
