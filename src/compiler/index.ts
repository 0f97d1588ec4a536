export { compile, compileOrThrow, type CompileResult } from './compile';
export { applyConfig, DEFAULT_STYLE, DEFAULT_FLOATING } from './config';
export { DEFAULT_TEXT_STYLE } from './build';
export type { ComponentUse } from './reusables';
export * from './types';
