export { appendToFile } from './file_appender';
