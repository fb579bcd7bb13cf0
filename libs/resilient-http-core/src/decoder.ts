import { z } from 'zod';
import { ApiError, DecodingError, UnclassifiedApiError } from './errors';
import type { RawHttpResponse } from './types';

/**
 * Error body returned by the service for rejected requests.
 */
export const apiErrorBodySchema = z.object({
  code: z.number(),
  message: z.string(),
});

export type ApiErrorBody = z.infer<typeof apiErrorBodySchema>;

type JsonParse = { ok: true; value: unknown } | { ok: false; error: unknown };

const parseJson = (text: string): JsonParse => {
  if (!text.trim()) {
    return { ok: true, value: undefined };
  }
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
};

const isSuccess = (status: number) => status >= 200 && status < 300;

/**
 * Turns a raw response into the decoded body or throws the matching error.
 *
 * Object schemas drop fields they do not declare, so new fields added by the
 * service never break decoding.
 */
export function decodeResponse<T>(
  response: RawHttpResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: { retryAfterMs?: number } = {},
): T {
  const parsed = parseJson(response.body);

  if (!isSuccess(response.status)) {
    throw decodeErrorResponse(response, parsed, options.retryAfterMs);
  }

  if (!parsed.ok) {
    throw new DecodingError(`Response body is not valid JSON (status ${response.status})`, {
      status: response.status,
      body: response.body,
      cause: parsed.error,
    });
  }

  const result = schema.safeParse(parsed.value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
    const summary = issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new DecodingError(`Response did not match the expected shape: ${summary}`, {
      status: response.status,
      issues,
      body: response.body,
      cause: result.error,
    });
  }
  return result.data;
}

const decodeErrorResponse = (
  response: RawHttpResponse,
  parsed: JsonParse,
  retryAfterMs?: number,
): ApiError | UnclassifiedApiError => {
  const errorBody = parsed.ok ? apiErrorBodySchema.safeParse(parsed.value) : undefined;
  if (errorBody?.success) {
    return new ApiError(errorBody.data.message, {
      status: response.status,
      code: errorBody.data.code,
      body: response.body,
      retryAfterMs,
    });
  }
  return new UnclassifiedApiError(`HTTP ${response.status}`, {
    status: response.status,
    body: response.body,
  });
};
