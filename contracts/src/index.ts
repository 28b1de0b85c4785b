// index.ts - Re-exports from all modules

// Types & primitives
export type {
  TimestampMs,
  DurationMs,
  SystemLabel,
  SystemType,
  CloudSystemType,
  OsVendor,
  ErrorCategory,
  StageName,
  ProvisionState,
  RebootMode,
  StepStatus,
  TestStatus,
  RunResult,
  SystemRunStatus,
  SystemRunReport,
} from './types';

export {
  SYSTEM_TYPES,
  OS_VENDORS,
  isSystemType,
  isOsVendor,
  isTerminalProvisionState,
} from './types';

// Errors
export {
  ZathrasError,
  ConfigurationError,
  DescriptorParseError,
  StageError,
  InstallError,
  ConflictError,
  TimeoutError,
  errorMessage,
  toErrorSummary,
} from './errors';

// Timing
export { TIMING, parseDuration } from './config/timing';
