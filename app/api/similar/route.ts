import { randomUUID } from 'crypto';
import { NextRequest, NextResponse } from 'next/server';
import { resolveSearchOptions } from '../../../lib/config';
import { isValidHost, normalizeDomain } from '../../../lib/domain';
import { ConfigError } from '../../../lib/errors';
import logger from '../../../lib/logger';
import { rateLimit } from '../../../lib/limits';
import { createDefaultCapabilities } from '../../../lib/tld/capabilities';
import { TldSearch } from '../../../lib/tld/tldSearch';
import type { SearchOptions } from '../../../lib/tld/types';

interface SimilarDomainsResponse {
  domain: string;
  keyword: string;
  results: string[];
  candidates: number;
  batches: number;
  state: string;
}

const OPTION_KEYS: ReadonlyArray<keyof SearchOptions> = [
  'activeOnly',
  'checkCommon',
  'commonTlds',
  'skipWildcards',
  'maxConcurrency',
  'tldListUrl',
];

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function pickOptions(body: Record<string, unknown>): Partial<Record<keyof SearchOptions, unknown>> {
  const out: Partial<Record<keyof SearchOptions, unknown>> = {};
  for (const k of OPTION_KEYS) {
    if (body[k] !== undefined) out[k] = body[k];
  }
  return out;
}

export async function POST(request: NextRequest) {
  const requestId = randomUUID();

  const clientIp = request.headers.get('x-forwarded-for')?.split(',')[0]?.trim() || 'unknown';
  if (!(await rateLimit(clientIp, 'similar-api'))) {
    return NextResponse.json({ error: 'Too many requests' }, { status: 429 });
  }

  try {
    const body: unknown = await request.json();
    if (!isRecord(body)) {
      return NextResponse.json({ error: 'Request body must be a JSON object' }, { status: 400 });
    }
    const { domain } = body;

    if (!domain || typeof domain !== 'string') {
      return NextResponse.json({ error: 'domain is required' }, { status: 400 });
    }

    let target: string;
    try {
      target = normalizeDomain(domain);
    } catch {
      return NextResponse.json({ error: 'Invalid domain' }, { status: 400 });
    }
    if (!isValidHost(target)) {
      return NextResponse.json({ error: 'Invalid domain' }, { status: 400 });
    }

    let options: SearchOptions;
    try {
      options = resolveSearchOptions(pickOptions(body));
    } catch (err) {
      if (err instanceof ConfigError) {
        return NextResponse.json({ error: err.message, field: err.field }, { status: 400 });
      }
      throw err;
    }

    logger.info({ requestId, target, options }, 'similar domain search started');

    const caps = createDefaultCapabilities(() => undefined, request.signal);
    const report = await new TldSearch(target, options, caps).start();

    if (report.error) {
      return NextResponse.json({ error: report.error }, { status: 502 });
    }

    const response: SimilarDomainsResponse = {
      domain: report.target,
      keyword: report.keyword,
      results: report.results,
      candidates: report.candidates,
      batches: report.batches,
      state: report.state,
    };
    return NextResponse.json(response);
  } catch (error) {
    logger.error({ requestId, err: error }, 'similar domain search failed');
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}
