// Face Metrics Pipeline - Error types
//
// Everything in this pipeline is pure computation, so the only failure is a
// caller handing it something it cannot work with (zero-sized frames, a
// rotation that is not a quarter turn, weights that do not sum to one).

export class ContractViolationError extends Error {
  readonly code = "CONTRACT_VIOLATION";

  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}
