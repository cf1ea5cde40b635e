export type PlyErrorKind =
  | 'InvalidInput'
  | 'InvalidHeader'
  | 'DuplicateElement'
  | 'DuplicateProperty'
  | 'PropertyBeforeElement'
  | 'MissingFormat'
  | 'MalformedRecord'
  | 'UnexpectedEof'
  | 'Io';

export interface PlyErrorContext {
  line?: number;
  text?: string;
  element?: string;
  property?: string;
  token?: string;
  cause?: unknown;
}

function formatMessage(reason: string, context: PlyErrorContext): string {
  let message = context.line !== undefined ? `Line ${context.line}: ${reason}` : reason;
  if (context.text !== undefined) {
    message += `\n\tString: '${context.text.replace(/\r?\n$|\r$/, '')}'`;
  }
  return message;
}

export class PlyError extends Error {
  readonly line?: number;
  readonly text?: string;
  readonly element?: string;
  readonly property?: string;
  readonly token?: string;

  constructor(
    public readonly kind: PlyErrorKind,
    public readonly reason: string,
    context: PlyErrorContext = {}
  ) {
    super(formatMessage(reason, context), { cause: context.cause });
    this.name = 'PlyError';
    this.line = context.line;
    this.text = context.text;
    this.element = context.element;
    this.property = context.property;
    this.token = context.token;
  }
}

export function isPlyError(error: unknown, kind?: PlyErrorKind): error is PlyError {
  return error instanceof PlyError && (kind === undefined || error.kind === kind);
}
