/**
 * Minimal XML-RPC client for fldigi.
 *
 * Only the two calls the monitor needs are supported: `rig.get_vfo` for the
 * tuned frequency and `system.listMethods` for diagnostics. Responses are
 * decoded just far enough to read scalar values, arrays of scalars and faults.
 */

import { Result, ok, err } from 'neverthrow';
import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import type { MonitorError } from './types.ts';
import { errorMessage, fetchError, parseError } from './utils.ts';

// ============================================================================
// Wire format
// ============================================================================

type XmlNode = Record<string, unknown>;

// Scalar tags fldigi may use for a value, in the order they are tried
const SCALAR_TAGS = ['string', 'double', 'i4', 'int'] as const;

const builder = new XMLBuilder({});

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined;
}

function asList(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

const parseXml = Result.fromThrowable(
  (xml: string): unknown => parser.parse(xml, true),
  (error) => parseError(`Failed to parse XML-RPC response: ${errorMessage(error, 'invalid XML')}`)
);

export function buildMethodCall(method: string): string {
  return `<?xml version="1.0"?>${builder.build({ methodCall: { methodName: method } })}`;
}

/**
 * Reads the scalar text of a `<value>` node: typed values first, then
 * untyped text. Returns null for structs, arrays and empty values.
 */
export function scalarValue(value: unknown): string | null {
  if (typeof value === 'string') return value === '' ? null : value;
  if (!isNode(value)) return null;

  for (const tag of SCALAR_TAGS) {
    const text = value[tag];
    if (typeof text === 'string' && text !== '') return text;
  }
  const text = value['#text'];
  return typeof text === 'string' && text !== '' ? text : null;
}

function describeFault(fault: unknown): string {
  const members = asList(child(child(child(fault, 'value'), 'struct'), 'member'));
  const fields = new Map<string, string>();
  for (const member of members) {
    const name = child(member, 'name');
    const value = scalarValue(child(member, 'value'));
    if (typeof name === 'string' && value !== null) fields.set(name, value);
  }

  const code = fields.get('faultCode');
  const message = fields.get('faultString') ?? 'no fault string';
  return code === undefined ? `XML-RPC fault: ${message}` : `XML-RPC fault ${code}: ${message}`;
}

/**
 * Decodes a `methodResponse` into the `<value>` nodes of its params.
 * Faults come back as FETCH_ERROR.
 */
export function parseMethodResponse(xml: string): Result<unknown[], MonitorError> {
  return parseXml(xml).andThen((doc) => {
    const response = child(doc, 'methodResponse');
    if (response === undefined) {
      return err(parseError('Missing methodResponse element'));
    }

    const fault = child(response, 'fault');
    if (fault !== undefined) {
      return err(fetchError(describeFault(fault)));
    }

    const params = asList(child(child(response, 'params'), 'param'));
    return ok(params.map((param) => child(param, 'value')));
  });
}

export function frequencyFromResponse(xml: string): Result<number, MonitorError> {
  return parseMethodResponse(xml).andThen((values) => {
    if (values.length === 0) {
      return err(parseError('No frequency data in response'));
    }

    const text = scalarValue(values[0]);
    if (text === null) {
      return err(parseError('Empty frequency response'));
    }

    const frequency = Number(text.trim());
    if (!Number.isFinite(frequency)) {
      return err(parseError(`Failed to parse frequency '${text}'`));
    }
    return ok(frequency);
  });
}

export function methodNamesFromResponse(xml: string): Result<string[], MonitorError> {
  return parseMethodResponse(xml).andThen((values) => {
    const items = asList(child(child(child(values[0], 'array'), 'data'), 'value'));
    const names = items.map(scalarValue).filter((name): name is string => name !== null);
    if (names.length === 0) {
      return err(parseError('No method names in response'));
    }
    return ok(names);
  });
}

// ============================================================================
// Client
// ============================================================================

export interface FldigiClientOptions {
  host: string;
  port: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export class FldigiClient {
  readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FldigiClientOptions) {
    this.url = `http://${options.host}:${options.port}/RPC2`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  private async call(method: string): Promise<Result<string, MonitorError>> {
    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/xml',
          'Accept': 'text/xml',
        },
        body: buildMethodCall(method),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        return err(fetchError(`HTTP ${response.status}: ${response.statusText}`));
      }

      return ok(await response.text());
    } catch (error) {
      return err(fetchError(errorMessage(error, 'Unknown fetch error')));
    }
  }

  async getFrequency(): Promise<Result<number, MonitorError>> {
    const body = await this.call('rig.get_vfo');
    return body.andThen(frequencyFromResponse);
  }

  async listMethods(): Promise<Result<string[], MonitorError>> {
    const body = await this.call('system.listMethods');
    return body.andThen(methodNamesFromResponse);
  }
}
