export class DuelError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class InvalidStatError extends DuelError {
  constructor(readonly stat: string) {
    super(`invalid stat ${stat}`)
  }
}

export class UnknownFormError extends DuelError {
  constructor(readonly form: string) {
    super(`no catalog entry for form ${form}`)
  }
}

/** Reference data the engine needs is absent from the catalogs. */
export class MissingReferenceError extends DuelError {
  constructor(readonly kind: string, readonly key: string) {
    super(`missing ${kind} ${key}`)
  }
}

export interface DataIssue {
  path: (string | number)[]
  message: string
}

/** Reference data that is present but fails validation as a whole. */
export class InvalidReferenceDataError extends DuelError {
  constructor(readonly kind: string, readonly issues: readonly DataIssue[]) {
    const first = issues[0]
    super(first ? `invalid ${kind} at ${first.path.join('.')}: ${first.message}` : `invalid ${kind}`)
  }
}

export class InvalidSwapError extends DuelError {
  constructor(readonly slot: number, reason: string) {
    super(`cannot switch to slot ${slot}: ${reason}`)
  }
}

export class ItemLockedError extends DuelError {
  constructor(readonly item: string) {
    super(`${item} cannot be removed.`)
  }
}

/** A submitted action the current state does not allow, or a turn on a finished duel. */
export class InvalidActionError extends DuelError {
  constructor(readonly side: number, reason: string) {
    super(`side ${side}: ${reason}`)
  }
}
