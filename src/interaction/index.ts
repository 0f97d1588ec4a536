export { InteractionTracker, hitTest } from './tracker';
export { EMPTY_VIEW } from './types';
export type {
  InteractionDelta,
  InteractionFlags,
  InteractionView,
  PointerState,
} from './types';
