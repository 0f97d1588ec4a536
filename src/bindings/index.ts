export {
  createBindingContext,
  type BindingContext,
  type BindingRecord,
  type BindingValue,
} from './context';
export {
  BindingScope,
  type BindingDiagnostic,
  type BindingKind,
  type BindingValues,
} from './scope';
