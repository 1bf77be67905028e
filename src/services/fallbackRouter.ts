import { MESSAGES, SLOT_QUESTIONS } from '../data/prompts';
import type { FallbackContext, SlotName } from '../types';

export function isSlotName(value: string | null | undefined): value is SlotName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SLOT_QUESTIONS, value);
}

/**
 * Picks the re-prompt for input the dialogue engine could not place.
 * Reads the context only; the caller decides what to do with the text.
 */
export function routeFallback(context: FallbackContext): string {
  const { crisisType, activeForm, requestedSlot } = context;

  if (!crisisType && !activeForm) {
    return MESSAGES.notUnderstood;
  }

  if (activeForm) {
    if (isSlotName(requestedSlot)) return SLOT_QUESTIONS[requestedSlot];
    return MESSAGES.answerCurrentQuestion;
  }

  return MESSAGES.offerMoreSteps;
}
