/**
 * Request parameter types.
 *
 * @module types/parameters
 */

import { z } from 'zod';

/**
 * A JSON-like value that may appear in a parameter map.
 */
export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | ParameterValue[]
  | { [key: string]: ParameterValue };

/**
 * Unencoded request body or query payload. Key order carries no meaning.
 */
export type Parameters = { [key: string]: ParameterValue };

/**
 * Zod schema for a single parameter value tree.
 */
export const ParameterValueSchema: z.ZodType<ParameterValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ParameterValueSchema),
    z.record(ParameterValueSchema),
  ])
);

/**
 * Zod schema for a parameter map.
 */
export const ParametersSchema: z.ZodType<Parameters> = z.record(ParameterValueSchema);

/**
 * Narrows an unknown value (typically parsed JSON) to a parameter map.
 */
export function isParameters(value: unknown): value is Parameters {
  return ParametersSchema.safeParse(value).success;
}
