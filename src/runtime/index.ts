export { createEngine } from './engine';
export type { Engine, EngineConfig, FrameInput, FrameResult } from './engine';
export { TemplateStore, type TemplateStoreOptions } from './template-store';
