import test from 'ava';
import {
  FldigiClient,
  buildMethodCall,
  frequencyFromResponse,
  methodNamesFromResponse,
  parseMethodResponse,
  scalarValue,
} from '../src/fldigi.ts';

function response(value: string): string {
  return `<?xml version="1.0"?>
<methodResponse>
  <params>
    <param>
      <value>${value}</value>
    </param>
  </params>
</methodResponse>`;
}

const FAULT = `<?xml version="1.0"?>
<methodResponse>
  <fault>
    <value>
      <struct>
        <member><name>faultCode</name><value><int>1</int></value></member>
        <member><name>faultString</name><value><string>rig not connected</string></value></member>
      </struct>
    </value>
  </fault>
</methodResponse>`;

interface RecordedRequest {
  url: string;
  method: string | undefined;
  contentType: string | null;
  body: string;
}

function fakeFetch(reply: () => Response | Promise<Response>): { requests: RecordedRequest[]; fetch: typeof fetch } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      method: init?.method,
      contentType: new Headers(init?.headers).get('Content-Type'),
      body: String(init?.body),
    });
    return reply();
  };
  return { requests, fetch: fetchImpl };
}

// buildMethodCall tests
test('buildMethodCall produces a methodCall document', t => {
  t.is(
    buildMethodCall('rig.get_vfo'),
    '<?xml version="1.0"?><methodCall><methodName>rig.get_vfo</methodName></methodCall>'
  );
});

// scalarValue tests
test('scalarValue reads typed and untyped values', t => {
  t.is(scalarValue('7074000'), '7074000');
  t.is(scalarValue({ string: '14074000' }), '14074000');
  t.is(scalarValue({ double: '21074000.0' }), '21074000.0');
  t.is(scalarValue({ i4: '28074000' }), '28074000');
  t.is(scalarValue({ int: '50313000' }), '50313000');
});

test('scalarValue returns null for empty and structured values', t => {
  t.is(scalarValue(''), null);
  t.is(scalarValue(undefined), null);
  t.is(scalarValue({ string: '' }), null);
  t.is(scalarValue({ array: { data: '' } }), null);
});

// frequencyFromResponse tests
test('frequencyFromResponse reads a double', t => {
  t.is(frequencyFromResponse(response('<double>14070000.000000</double>'))._unsafeUnwrap(), 14_070_000);
});

test('frequencyFromResponse reads a string', t => {
  t.is(frequencyFromResponse(response('<string>28074000</string>'))._unsafeUnwrap(), 28_074_000);
});

test('frequencyFromResponse reads an i4', t => {
  t.is(frequencyFromResponse(response('<i4>7074000</i4>'))._unsafeUnwrap(), 7_074_000);
});

test('frequencyFromResponse reads an untyped value', t => {
  t.is(frequencyFromResponse(response('3573000'))._unsafeUnwrap(), 3_573_000);
});

test('frequencyFromResponse reports faults as fetch errors', t => {
  t.deepEqual(frequencyFromResponse(FAULT)._unsafeUnwrapErr(), {
    type: 'FETCH_ERROR',
    message: 'XML-RPC fault 1: rig not connected',
  });
});

test('frequencyFromResponse rejects a response without params', t => {
  const xml = '<?xml version="1.0"?><methodResponse><params></params></methodResponse>';
  t.deepEqual(frequencyFromResponse(xml)._unsafeUnwrapErr(), {
    type: 'PARSE_ERROR',
    message: 'No frequency data in response',
  });
});

test('frequencyFromResponse rejects an empty value', t => {
  t.deepEqual(frequencyFromResponse(response(''))._unsafeUnwrapErr(), {
    type: 'PARSE_ERROR',
    message: 'Empty frequency response',
  });
});

test('frequencyFromResponse rejects a non-numeric value', t => {
  t.deepEqual(frequencyFromResponse(response('<string>abc</string>'))._unsafeUnwrapErr(), {
    type: 'PARSE_ERROR',
    message: "Failed to parse frequency 'abc'",
  });
});

test('parseMethodResponse rejects malformed XML', t => {
  const error = parseMethodResponse('not xml')._unsafeUnwrapErr();
  t.is(error.type, 'PARSE_ERROR');
  t.true(error.message.startsWith('Failed to parse XML-RPC response: '));
});

test('parseMethodResponse rejects documents that are not responses', t => {
  t.deepEqual(parseMethodResponse('<methodCall><methodName>x</methodName></methodCall>')._unsafeUnwrapErr(), {
    type: 'PARSE_ERROR',
    message: 'Missing methodResponse element',
  });
});

// methodNamesFromResponse tests
test('methodNamesFromResponse lists typed and untyped names', t => {
  const xml = response(
    '<array><data><value><string>rig.get_vfo</string></value><value>system.listMethods</value></data></array>'
  );
  t.deepEqual(methodNamesFromResponse(xml)._unsafeUnwrap(), ['rig.get_vfo', 'system.listMethods']);
});

test('methodNamesFromResponse accepts a single-entry array', t => {
  const xml = response('<array><data><value><string>rig.get_vfo</string></value></data></array>');
  t.deepEqual(methodNamesFromResponse(xml)._unsafeUnwrap(), ['rig.get_vfo']);
});

// FldigiClient tests
test('FldigiClient posts rig.get_vfo to the RPC2 endpoint', async t => {
  const { requests, fetch } = fakeFetch(() => new Response(response('<double>7074000</double>')));
  const client = new FldigiClient({ host: '192.0.2.10', port: 7362, fetch });

  const frequency = await client.getFrequency();

  t.is(frequency._unsafeUnwrap(), 7_074_000);
  t.is(client.url, 'http://192.0.2.10:7362/RPC2');
  t.deepEqual(requests, [{
    url: 'http://192.0.2.10:7362/RPC2',
    method: 'POST',
    contentType: 'text/xml',
    body: '<?xml version="1.0"?><methodCall><methodName>rig.get_vfo</methodName></methodCall>',
  }]);
});

test('FldigiClient reports HTTP errors', async t => {
  const { fetch } = fakeFetch(() => new Response('', { status: 500, statusText: 'Internal Server Error' }));
  const client = new FldigiClient({ host: '127.0.0.1', port: 7362, fetch });

  const error = (await client.getFrequency())._unsafeUnwrapErr();

  t.deepEqual(error, { type: 'FETCH_ERROR', message: 'HTTP 500: Internal Server Error' });
});

test('FldigiClient reports transport failures', async t => {
  const { fetch } = fakeFetch(() => Promise.reject(new TypeError('fetch failed')));
  const client = new FldigiClient({ host: '127.0.0.1', port: 7362, fetch });

  const error = (await client.getFrequency())._unsafeUnwrapErr();

  t.deepEqual(error, { type: 'FETCH_ERROR', message: 'fetch failed' });
});

test('FldigiClient passes fault responses through as errors', async t => {
  const { fetch } = fakeFetch(() => new Response(FAULT));
  const client = new FldigiClient({ host: '127.0.0.1', port: 7362, fetch });

  const error = (await client.getFrequency())._unsafeUnwrapErr();

  t.is(error.message, 'XML-RPC fault 1: rig not connected');
});

test('FldigiClient lists methods', async t => {
  const xml = response('<array><data><value>fldigi.version</value><value>rig.get_vfo</value></data></array>');
  const { requests, fetch } = fakeFetch(() => new Response(xml));
  const client = new FldigiClient({ host: '127.0.0.1', port: 7362, fetch });

  const methods = await client.listMethods();

  t.deepEqual(methods._unsafeUnwrap(), ['fldigi.version', 'rig.get_vfo']);
  t.is(requests[0]?.body, '<?xml version="1.0"?><methodCall><methodName>system.listMethods</methodName></methodCall>');
});
