/**
 * TypeBox schemas for values crossing the provider boundary
 */

import { Type, type Static } from '@sinclair/typebox';

/**
 * Decision-shaped mapping a provider must return. Only the verdict and its
 * category are checked; `reason`, `confidence` and anything else the model
 * adds pass through untouched.
 */
export const ProviderCompletionSchema = Type.Object(
  {
    should_store: Type.Boolean(),
    category: Type.String(),
  },
  { $id: 'ProviderCompletion', additionalProperties: true }
);

export type ProviderCompletionType = Static<typeof ProviderCompletionSchema>;
