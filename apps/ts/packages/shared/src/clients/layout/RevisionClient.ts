/**
 * Revision Client
 * Fetches one layout revision from the remote query endpoint
 */

import { z } from 'zod';
import { MalformedResponseError, toError } from '../../errors';
import type { LayoutAddress } from '../../layout/address';
import { BaseLayoutServiceClient } from '../base/BaseLayoutServiceClient';
import { extractErrorMessage } from '../base/http-client';
import { GET_LAYOUT_OPERATION, GET_LAYOUT_QUERY } from './queries';
import { extractRawMembers } from './raw-json';
import type { LayoutQueryRequest, RevisionFetcher, RevisionPayload } from './types';

/**
 * Only the revision id is typed; the remainder of `Data` is owned by the
 * remote service and passed through untouched.
 */
const RevisionIdSchema = z.object({
  layout: z.object({
    revision: z.object({
      hashId: z.string().min(1),
    }),
  }),
});

const ResponseEnvelopeSchema = z.record(z.unknown());

/**
 * Build the request document for a decoded layout address
 */
export function buildLayoutQuery(address: LayoutAddress): LayoutQueryRequest {
  return {
    operationName: GET_LAYOUT_OPERATION,
    variables: {
      hashId: address.layoutId,
      geometry: address.geometry,
      revisionId: address.revisionId,
    },
    query: GET_LAYOUT_QUERY,
  };
}

/**
 * Name of the `Data` member, falling back to a case-insensitive match
 * since GraphQL servers conventionally answer with `data`
 */
function findDataKey(envelope: Record<string, unknown>): string | undefined {
  if (envelope.Data !== undefined) {
    return 'Data';
  }
  return Object.keys(envelope).find((candidate) => candidate.toLowerCase() === 'data');
}

/**
 * Parse a query endpoint response body into the revision id and opaque data
 */
export function parseRevisionResponse(body: string): RevisionPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new MalformedResponseError('Failed to parse revision data: response is not valid JSON', toError(error));
  }

  const envelope = ResponseEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    throw new MalformedResponseError('Failed to parse revision data: response is not a JSON object');
  }

  const remoteError = extractErrorMessage(envelope.data);
  const dataKey = findDataKey(envelope.data);
  const data = dataKey === undefined ? undefined : envelope.data[dataKey];
  if (dataKey === undefined || data === undefined || data === null) {
    const detail = remoteError ? ` (${remoteError})` : '';
    throw new MalformedResponseError(`Failed to parse revision data: missing Data field${detail}`);
  }

  const revision = RevisionIdSchema.safeParse(data);
  if (!revision.success) {
    const detail = remoteError ? ` (${remoteError})` : '';
    throw new MalformedResponseError(
      `Failed to parse revision ID: layout.revision.hashId is missing or not a string${detail}`
    );
  }

  // Member text exactly as sent
  const raw = extractRawMembers(body).get(dataKey);
  if (raw === undefined) {
    throw new MalformedResponseError('Failed to parse revision data: Data field could not be located in the response');
  }

  return {
    revisionId: revision.data.layout.revision.hashId,
    data: Buffer.from(raw, 'utf8'),
  };
}

export class RevisionClient extends BaseLayoutServiceClient implements RevisionFetcher {
  async fetchRevision(address: LayoutAddress): Promise<RevisionPayload> {
    const url = this.endpoints.queryEndpoint;
    const request = buildLayoutQuery(address);

    this.logger.debug('Fetching layout revision', { ...request.variables });

    const body = await this.fetchText(url, 'revision data', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
    });

    const payload = parseRevisionResponse(body);
    this.logger.debug('Fetched layout revision', {
      revisionId: payload.revisionId,
      bytes: payload.data.length,
    });

    return payload;
  }
}
