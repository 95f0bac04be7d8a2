import { z } from 'zod';
import { GROUNDING_CONSTANTS } from '../config/constants.js';
import { ResolutionError } from '../core/errors.js';
import type { AnnotationPayload } from '../core/types.js';
import { requestText } from '../http/client.js';
import type { HttpOptions } from '../http/client.js';

export interface GildaClientOptions extends HttpOptions {
  baseUrl?: string;
}

const SERVICE_NAME = 'Gilda grounding service';

const AnnotationPayloadSchema = z.array(z.unknown());

/**
 * Join an endpoint onto a base URL, keeping any path the base already has
 */
export function buildEndpointUrl(baseUrl: string, endpoint: string): URL {
  const base = new URL(baseUrl);
  base.pathname = `${base.pathname.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
  return base;
}

export function parseAnnotationPayload(body: string): AnnotationPayload {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ResolutionError('invalid_response', `${SERVICE_NAME} returned a body that is not JSON`, {
      service: SERVICE_NAME,
      cause: error
    });
  }

  const parsed = AnnotationPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new ResolutionError('invalid_response', `${SERVICE_NAME} returned ${describeJsonType(json)} instead of an annotation list`, {
      service: SERVICE_NAME
    });
  }

  return parsed.data;
}

function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  return `a JSON ${typeof value}`;
}

/**
 * Run text through Gilda's named entity recognition endpoint.
 */
export async function annotateText(text: string, options: GildaClientOptions = {}): Promise<AnnotationPayload> {
  const url = buildEndpointUrl(options.baseUrl ?? GROUNDING_CONSTANTS.BASE_URL, GROUNDING_CONSTANTS.ANNOTATE_ENDPOINT);

  const body = await requestText(
    url,
    {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json'
      },
      body: JSON.stringify({ text })
    },
    { ...options, service: SERVICE_NAME }
  );

  return parseAnnotationPayload(body);
}
