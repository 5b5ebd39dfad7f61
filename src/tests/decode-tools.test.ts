import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Config } from '../shared/config';
import { decodeDataUri, inspectMediaType, validateDataUri } from '../tools/decode-tools';

const config: Config = { mode: 'read', maxInputSizeMB: 1, defaultBase64: true };

test('decodeDataUri reports the summary and the text content', async () => {
  const result = await decodeDataUri({ uri: 'data:,hello+world' }, config);

  assert.equal(result.isError, undefined);
  assert.deepEqual(result.content, [
    {
      type: 'text',
      text: [
        'contentType: text/plain;charset=US-ASCII',
        'mimeType: text/plain',
        'parameters: charset="US-ASCII"',
        'charset: US-ASCII',
        'contentLength: 11 bytes',
      ].join('\n'),
    },
    { type: 'text', text: 'hello world' },
  ]);
});

test('decodeDataUri returns images as image content', async () => {
  const result = await decodeDataUri({ uri: 'data:image/png;base64,AAEC' }, config);

  assert.deepEqual(result.content[1], { type: 'image', mimeType: 'image/png', data: 'AAEC' });
  assert.deepEqual(result.content[0], {
    type: 'text',
    text: 'contentType: image/png\nmimeType: image/png\nparameters: (none)\ncharset: (none)\ncontentLength: 3 bytes',
  });
});

test('decodeDataUri returns other binary content as base64', async () => {
  const result = await decodeDataUri({ uri: 'data:application/octet-stream;base64,AAEC' }, config);

  assert.deepEqual(result.content[1], { type: 'text', text: 'base64: AAEC' });
});

test('decodeDataUri decodes text when a charset is given', async () => {
  const result = await decodeDataUri({ uri: 'data:application/json;charset=UTF-8,%7B%22a%22%3A%22%C3%A9%22%7D' }, config);

  assert.deepEqual(result.content[1], { type: 'text', text: '{"a":"é"}' });
});

test('decodeDataUri honours the requested format', async () => {
  const base64 = await decodeDataUri({ uri: 'data:,hello', format: 'base64' }, config);
  assert.deepEqual(base64.content[1], { type: 'text', text: 'base64: aGVsbG8=' });

  const none = await decodeDataUri({ uri: 'data:,hello', format: 'none' }, config);
  assert.equal(none.content.length, 1);

  const text = await decodeDataUri({ uri: 'data:application/octet-stream;base64,aGk=', format: 'text' }, config);
  assert.deepEqual(text.content[1], { type: 'text', text: 'hi' });
});

test('decodeDataUri falls back to base64 for an unknown charset', async () => {
  const result = await decodeDataUri({ uri: 'data:text/plain;charset=x-unknown;base64,aGk=' }, config);

  assert.deepEqual(result.content[1], { type: 'text', text: 'base64: aGk=' });
});

test('decodeDataUri reports an unknown charset when text is requested', async (t) => {
  const error = t.mock.method(console, 'error', () => {});

  const result = await decodeDataUri({ uri: 'data:text/plain;charset=x-unknown;base64,aGk=', format: 'text' }, config);

  assert.equal(result.isError, true);
  assert.deepEqual(result.content, [{ type: 'text', text: 'Error: UNSUPPORTED_CHARSET: x-unknown' }]);
  assert.equal(error.mock.calls[0].arguments[0], 'Error in decodeDataUri: UNSUPPORTED_CHARSET: x-unknown');
});

test('decodeDataUri reports malformed URIs', async (t) => {
  t.mock.method(console, 'error', () => {});

  const result = await decodeDataUri({ uri: 'data:text/plain' }, config);

  assert.equal(result.isError, true);
  assert.deepEqual(result.content, [
    { type: 'text', text: 'Error: MISSING_COMMA: Missing comma in data URI: "data:text/plain"' },
  ]);
});

test('decodeDataUri refuses URIs over the size limit', async () => {
  const result = await decodeDataUri({ uri: 'data:,hello+world' }, { ...config, maxInputSizeMB: 0.00001 });

  assert.equal(result.isError, true);
  assert.deepEqual(result.content, [
    { type: 'text', text: 'Error: data URI is 17 characters long, exceeds the limit of 10' },
  ]);
});

test('inspectMediaType lists the parts of a media type', async () => {
  const result = await inspectMediaType({ mediaType: 'text/html; charset="UTF-8"; q=1' });

  assert.deepEqual(result.content, [
    {
      type: 'text',
      text: 'mimeType: text/html\nparameters: charset="UTF-8", q="1"\ncharset: UTF-8\ncanonicalForm: text/html;charset=UTF-8;q=1',
    },
  ]);
});

test('inspectMediaType reports invalid media types', async (t) => {
  t.mock.method(console, 'error', () => {});

  const result = await inspectMediaType({ mediaType: 'html' });

  assert.equal(result.isError, true);
  assert.deepEqual(result.content, [{ type: 'text', text: 'Error: INVALID_MIME_TYPE: Invalid MIME type: "html"' }]);
});

test('validateDataUri', async (t) => {
  t.mock.method(console, 'error', () => {});

  const valid = await validateDataUri({ uri: 'data:;base64,aGVsbG8=' });
  assert.deepEqual(valid.content, [{ type: 'text', text: 'Valid data URI: text/plain;charset=US-ASCII, 5 bytes' }]);

  const invalid = await validateDataUri({ uri: 'ftp://example.com/file' });
  assert.equal(invalid.isError, true);
  assert.deepEqual(invalid.content, [
    { type: 'text', text: 'Error: INVALID_PROTOCOL: Invalid protocol: expected "data" but got "ftp"' },
  ]);
});
