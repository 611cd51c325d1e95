export { FontResolver } from './FontResolver.js';
