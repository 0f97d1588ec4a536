export { emit, type EventSink, type LayoutEvent, type PointerButton } from './emitter';
