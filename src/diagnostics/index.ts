export {
  CollectingDiagnosticsSink,
  LoggingDiagnosticsSink,
  type Diagnostic,
  type DiagnosticLocation,
  type DiagnosticSeverity,
  type DiagnosticsSink,
} from './sink';
