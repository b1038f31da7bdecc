/**
 * Boundary parsing for inbound interaction contexts.
 * Anything outside the closed enumerations is rejected here, so the
 * decision engine only ever sees well-formed contexts.
 */

import { ValidationError, formatZodIssues } from '../lib/errors';
import {
  InteractionContext,
  InteractionContextInput,
  InteractionContextSchema
} from '../types/interaction-style';

/**
 * Drop null (unknown) attributes and freeze the result.
 */
export function toInteractionContext(input: InteractionContextInput): InteractionContext {
  const context: {
    -readonly [K in keyof InteractionContext]: InteractionContext[K];
  } = {};

  if (input.knowledge) context.knowledge = input.knowledge;
  if (input.emotion) context.emotion = input.emotion;
  if (input.clarity) context.clarity = input.clarity;
  if (input.urgency) context.urgency = input.urgency;
  if (input.stakes) context.stakes = input.stakes;

  return Object.freeze(context);
}

/**
 * Validate an untrusted payload as an interaction context.
 * Throws ValidationError listing every offending field.
 */
export function parseInteractionContext(payload: unknown): InteractionContext {
  const validation = InteractionContextSchema.safeParse(payload ?? {});
  if (!validation.success) {
    const issues = formatZodIssues(validation.error);
    throw new ValidationError('Validation failed', issues);
  }
  return toInteractionContext(validation.data);
}
