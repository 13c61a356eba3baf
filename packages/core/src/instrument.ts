import type { Instrument, OutcomeToken } from './types.js';

/** The token the engine quotes: the first ("Yes"/"Up") outcome. */
export function primaryToken(instrument: Instrument): OutcomeToken {
  const token = instrument.tokens[0];
  if (!token) {
    throw new Error(`Instrument ${instrument.id} has no outcome tokens`);
  }
  return token;
}
