/**
 * Engine
 *
 * One frame: snapshot -> solve -> tracker update -> emit -> render commands.
 * Everything but the tracker's state map is rebuilt from scratch each call,
 * and that map starts over whenever the frame's page changes.
 */

import type { BindingContext } from '../bindings/context';
import type { BindingDiagnostic } from '../bindings/scope';
import type { CompileError } from '../common/errors';
import type { CompileResult } from '../compiler/compile';
import { emit, type EventSink, type LayoutEvent } from '../events/emitter';
import { logger } from '../dev/logger';
import { InteractionTracker } from '../interaction/tracker';
import type { InteractionDelta, InteractionView, PointerState } from '../interaction/types';
import { solve } from '../layout/solve';
import type { LayoutTree, Point, Size, TextMeasurer } from '../layout/types';
import { toRenderCommands, type RenderCommand } from '../render/commands';
import { TemplateStore } from './template-store';

export interface EngineConfig {
  /** Receives every emitted event; errors it throws propagate out of frame() */
  onEvent: EventSink;
  measureText?: TextMeasurer;
  onDiagnostic?: (diagnostic: BindingDiagnostic) => void;
  onCompileError?: (error: CompileError) => void;
}

export interface FrameInput {
  page: string;
  bindings: BindingContext;
  viewport: Size;
  /** null while the pointer is outside the surface */
  pointer: PointerState | null;
  scrollOffsets?: Readonly<Record<string, Point>>;
}

export interface FrameResult {
  layout: LayoutTree;
  delta: InteractionDelta;
  events: LayoutEvent[];
  commands: RenderCommand[];
}

export interface Engine {
  readonly templates: TemplateStore;
  load(markup: string): CompileResult;
  reload(source: string | Promise<string>): Promise<CompileResult>;
  frame(input: FrameInput): FrameResult;
  /** Interaction state as of the last frame */
  interaction(): InteractionView;
}

function validateConfig(config: EngineConfig): void {
  if (!config || typeof config !== 'object') {
    throw new Error('createEngine requires a config object');
  }
  if (typeof config.onEvent !== 'function') {
    throw new Error('createEngine: onEvent must be a function');
  }
  for (const key of ['measureText', 'onDiagnostic', 'onCompileError'] as const) {
    const value = config[key];
    if (value !== undefined && typeof value !== 'function') {
      throw new Error(`createEngine: ${key} must be a function when given`);
    }
  }
}

/**
 * Create an engine
 *
 * @example
 * ```ts
 * const engine = createEngine({ onEvent: (e) => dispatch(e.name) });
 * engine.load(markup);
 * const { commands } = engine.frame({ page: 'Main', bindings, viewport, pointer });
 * ```
 */
export function createEngine(config: EngineConfig): Engine {
  validateConfig(config);

  const templates = new TemplateStore({ onCompileError: config.onCompileError });
  const tracker = new InteractionTracker();
  let activePage: string | undefined;

  return {
    templates,
    load: (markup) => templates.load(markup),
    reload: (source) => templates.reload(source),
    interaction: () => tracker.view(),

    frame(input) {
      const template = templates.get(input.page);
      if (!template) {
        throw new Error(`No template is loaded for page '${input.page}'`);
      }
      // Interaction state belongs to one page's ids.
      if (input.page !== activePage) {
        if (activePage !== undefined) logger.debug(`Page changed to '${input.page}'`);
        tracker.reset();
        activePage = input.page;
      }

      const layout = solve(template, input.bindings, input.viewport, tracker.view(), {
        measureText: config.measureText,
        scrollOffsets: input.scrollOffsets,
      });
      for (const diagnostic of layout.diagnostics) config.onDiagnostic?.(diagnostic);

      const delta = tracker.update(layout, input.pointer);
      const events = emit(layout, delta, config.onEvent);
      return { layout, delta, events, commands: toRenderCommands(layout) };
    },
  };
}
