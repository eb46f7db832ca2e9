export class InterpretationLookupError extends Error {
  constructor(
    public table: string,
    public key: string,
    detail: string
  ) {
    super(`Interpretation lookup failed (${table}, ${key}): ${detail}`);
    this.name = "InterpretationLookupError";
  }
}
