export { TempDirs } from './temp-dir.js';
