// pattern: Functional Core

export type { CapabilityProfile, ExecutionOutput, SandboxSession } from './session.ts';
export { DEFAULT_CAPABILITY_PROFILE, createSandboxSession } from './session.ts';
export { compileRestricted, type CompileResult } from './compile.ts';
export { SandboxRuntimeError, SandboxSyntaxError, type SandboxErrorKind } from './errors.ts';
