export { GridCalculator, computeGridSpec, formatNumber, targetFilename, targetTitle } from './GridCalculator.js';
