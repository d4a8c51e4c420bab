export { runConvert } from './convert.js';
