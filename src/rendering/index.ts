export { TargetRenderer } from './TargetRenderer.js';
export { GridRenderer } from './GridRenderer.js';
export type { GridRendererConfig } from './GridRenderer.js';
export { AimPointRenderer } from './AimPointRenderer.js';
export type { AimPointRendererConfig } from './AimPointRenderer.js';
export { TextRenderer } from './TextRenderer.js';
export type { TextRendererConfig } from './TextRenderer.js';
