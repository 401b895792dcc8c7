/**
 * Error taxonomy for the session engine. Every error carries a stable `code`
 * so boundary layers can map it without instanceof chains.
 */

export type EngineErrorCode =
  | 'SPAWN_FAILED'
  | 'PROCESS_NOT_RUNNING'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_EXISTS'
  | 'SESSION_LIMIT'
  | 'SAFETY_VIOLATION'
  | 'PATH_NOT_ALLOWED'
  | 'JUDGE_INPUT_FILE_MISSING';

export class EngineError extends Error {
  constructor(
    readonly code: EngineErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

export class SpawnError extends EngineError {
  constructor(
    message: string,
    readonly command: string
  ) {
    super('SPAWN_FAILED', message);
    this.name = 'SpawnError';
  }
}

export class ProcessNotRunningError extends EngineError {
  constructor(readonly pid: number) {
    super('PROCESS_NOT_RUNNING', `Process ${pid} is not running`);
    this.name = 'ProcessNotRunningError';
  }
}

export class SessionNotFoundError extends EngineError {
  constructor(readonly sessionId: string) {
    super('SESSION_NOT_FOUND', `Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionExistsError extends EngineError {
  constructor(readonly sessionId: string) {
    super('SESSION_EXISTS', `Session ${sessionId} already exists`);
    this.name = 'SessionExistsError';
  }
}

export class SessionLimitError extends EngineError {
  constructor(readonly limit: number) {
    super('SESSION_LIMIT', `Maximum concurrent sessions (${limit}) reached`);
    this.name = 'SessionLimitError';
  }
}

export class SafetyViolationError extends EngineError {
  constructor(
    readonly commandText: string,
    readonly policy: string,
    readonly rule: string
  ) {
    super('SAFETY_VIOLATION', `Command '${commandText}' is not allowed by the ${policy} policy: ${rule}`);
    this.name = 'SafetyViolationError';
  }
}

export class PathNotAllowedError extends EngineError {
  constructor(
    readonly path: string,
    readonly access: 'read' | 'write'
  ) {
    super('PATH_NOT_ALLOWED', `Path ${path} is not allowed for ${access} by the sandbox`);
    this.name = 'PathNotAllowedError';
  }
}

export class JudgeInputFileMissingError extends EngineError {
  constructor(readonly path: string) {
    super(
      'JUDGE_INPUT_FILE_MISSING',
      `Input file ${path} does not exist, please check the path and call again.`
    );
    this.name = 'JudgeInputFileMissingError';
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
