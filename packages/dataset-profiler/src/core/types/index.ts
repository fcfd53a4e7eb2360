export type * from './field-value.js';
export type * from './dataset.js';
export type * from './code-list.js';
export type * from './preview.js';
export type * from './diagnostics.js';
export type * from './document.js';
