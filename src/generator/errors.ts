export class GenerateError extends Error {
  /** Object type the failing definition declares, when there is one */
  readonly definition?: string;

  constructor(message: string, definition?: string) {
    super(`[Generate Error] ${message}`);
    this.name = 'GenerateError';
    this.definition = definition;
  }
}
