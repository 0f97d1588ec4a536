/**
 * boxwood: declarative UI-description engine
 *
 * Markup is compiled once into a frozen template; every frame the template
 * is bound to host data, laid out, hit-tested and turned into render
 * commands. Only per-element interaction state survives between frames.
 */

// Engine
export { createEngine, TemplateStore } from './runtime';
export type {
  Engine,
  EngineConfig,
  FrameInput,
  FrameResult,
  TemplateStoreOptions,
} from './runtime';

// Compiler
export { compile, compileOrThrow } from './compiler';
export type {
  CompileResult,
  IntermediateTemplate,
  TemplateNode,
  ElementTemplate,
  TextTemplate,
  ListTemplate,
  ConditionalTemplate,
  StyleSpec,
  StyleProps,
  TextStyleSpec,
  Color,
  AttachPoint,
} from './compiler';

// Bindings
export { createBindingContext, BindingScope } from './bindings';
export type {
  BindingContext,
  BindingRecord,
  BindingValue,
  BindingDiagnostic,
} from './bindings';

// Layout
export { solve, monospaceMeasurer } from './layout';
export type {
  LayoutTree,
  LayoutNode,
  Rect,
  Size,
  Point,
  TextMeasurer,
  TextStyle,
  SolveOptions,
} from './layout';

// Interaction and events
export { InteractionTracker, hitTest } from './interaction';
export type {
  InteractionDelta,
  InteractionFlags,
  InteractionView,
  PointerState,
} from './interaction';
export { emit } from './events';
export type { LayoutEvent, EventSink, PointerButton } from './events';

// Render
export { toRenderCommands } from './render';
export type { RenderCommand } from './render';

// Errors
export { CompileError, BindingError, isBindingError, handle } from './common/errors';
export type { CompileErrorCode, BindingErrorCode } from './common/errors';
