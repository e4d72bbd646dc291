import { MessageFlags, SEQUENCE_MASK } from './messageTypes.js';

export type SequencePolicy = (flags: number) => boolean;

/**
 * Whether a frame with these flag bits carries a sequence number.
 * Encoder and decoder both consult this; a second copy of the rule is a protocol bug.
 */
export const hasSequence: SequencePolicy = (flags) => {
  const bits = flags & SEQUENCE_MASK;
  return bits === MessageFlags.PositiveSeq || bits === MessageFlags.NegativeSeq;
};
