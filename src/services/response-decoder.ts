import { z, type ZodType } from 'zod';
import { DecodeError, GraphQLResponseError } from '../utils/errors.js';
import type { GraphQLErrorPayload, GraphQLResponse } from '../types/graphql.js';

const errorLocationSchema = z.object({
  line: z.number().int(),
  column: z.number().int(),
});

const graphqlErrorSchema: ZodType<GraphQLErrorPayload> = z.object({
  message: z.string(),
  locations: z.array(errorLocationSchema).optional(),
  path: z.array(z.union([z.string(), z.number()])).optional(),
  extensions: z.unknown().optional(),
});

const responseEnvelopeSchema: ZodType<GraphQLResponse> = z.object({
  data: z.unknown().optional(),
  errors: z.array(graphqlErrorSchema).nullish(),
});

export function decodeResponse(body: string): GraphQLResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new DecodeError(
      error instanceof Error ? error.message : 'invalid JSON',
      { bodyLength: body.length },
      error
    );
  }

  const result = responseEnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    throw new DecodeError('body is not a GraphQL response envelope', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return result.data;
}

/** Throws the first server-reported error, if there is one. */
export function assertNoErrors(response: GraphQLResponse): void {
  const [first, ...others] = response.errors ?? [];
  if (first) {
    throw new GraphQLResponseError(first, others);
  }
}

export function decodeData<T>(data: unknown, schema?: ZodType<T>): T {
  if (!schema) {
    return data as T;
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new DecodeError('data does not match the expected shape', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}
