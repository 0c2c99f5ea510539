/**
 * Follows the `{"link": "<url>"}` indirection the data API uses for
 * payloads parked in blob storage. One level only.
 */

import { AxiosResponse } from 'axios';
import { logger } from '../../utils/logger';
import { describeTransportError, HttpClient, isJsonObject, parseJsonBody } from './http';
import { failure, JsonValue, Result, success } from './types';

function hasLink(body: JsonValue): boolean {
  return isJsonObject(body) && 'link' in body;
}

export async function resolveLink(http: HttpClient, body: JsonValue): Promise<Result<JsonValue>> {
  if (!isJsonObject(body) || !('link' in body)) {
    return success(body);
  }

  const link = body['link'];
  if (typeof link !== 'string' || link.length === 0) {
    logger.error('iRacing link payload has no usable URL');
    return failure('Link payload without a URL', 'MALFORMED_PAYLOAD', undefined, body);
  }

  let response: AxiosResponse<unknown>;
  try {
    // Pre-signed URL: no Authorization header
    response = await http.get<unknown>(link, { responseType: 'text' });
  } catch (error) {
    logger.error('Failed to fetch linked iRacing data', describeTransportError(error));
    return failure('Linked data request failed', 'TRANSPORT_ERROR', undefined, describeTransportError(error));
  }

  if (response.status !== 200) {
    logger.error('Failed to fetch linked iRacing data', { status: response.status });
    return failure(`Linked data returned ${response.status}`, 'HTTP_ERROR', response.status);
  }

  const parsed = parseJsonBody(response.data);
  if (!parsed.ok) {
    logger.error('iRacing linked data is not JSON', { reason: parsed.error.message });
    return parsed;
  }

  if (hasLink(parsed.value)) {
    logger.error('iRacing linked data points at another link');
    return failure('Nested link indirection is not supported', 'MALFORMED_PAYLOAD');
  }

  return parsed;
}
