/**
 * Campaign error types.
 *
 * Only bookkeeping failures are modelled as errors here. Command and oracle
 * failures never surface as exceptions: they come back as failed envelopes or
 * degraded text and are recovered where they happen.
 */

export class CampaignError extends Error {
  readonly code: string;

  constructor(message: string, code: string = 'CAMPAIGN_ERROR') {
    super(message);
    this.name = 'CampaignError';
    this.code = code;
  }
}

/** Raised when a phase is entered out of order or a second time. */
export class PhaseTransitionError extends CampaignError {
  constructor(message: string) {
    super(message, 'PHASE_TRANSITION');
    this.name = 'PhaseTransitionError';
  }
}

/** Raised when the registry is asked to mutate a target it does not hold. */
export class UnknownTargetError extends CampaignError {
  readonly target: string;

  constructor(target: string) {
    super(`Unknown target: ${target}`, 'UNKNOWN_TARGET');
    this.name = 'UnknownTargetError';
    this.target = target;
  }
}

/** Raised when config/command-rules.json is missing or malformed. */
export class CommandRulesError extends CampaignError {
  constructor(message: string) {
    super(message, 'COMMAND_RULES');
    this.name = 'CommandRulesError';
  }
}

/**
 * Extract error message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}
