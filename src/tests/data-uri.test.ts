import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Buffer } from 'buffer';
import { decodeDataUriBody, formatDataUri, getScheme, parseDataUri, validateDataUri } from '../shared/data-uri';
import { isDataUriError } from '../shared/errors';
import { MediaType } from '../shared/media-type';

test('a data URI without a media type uses text/plain;charset=US-ASCII', () => {
  const resource = parseDataUri('data:,hello+world');

  assert.ok(resource.mediaType.equals(MediaType.DEFAULT));
  assert.equal(resource.contentType, 'text/plain;charset=US-ASCII');
  assert.equal(resource.contentEncoding, 'US-ASCII');
  assert.equal(resource.contentLength, 11);
  assert.equal(resource.getContent().toString('ascii'), 'hello world');
  assert.equal(resource.path, ',hello+world');
  assert.equal(resource.url, 'data:,hello+world');
});

test('a base64 data URI with a media type', () => {
  const resource = parseDataUri('data:text/plain;charset=UTF-8;base64,aGVsbG8=');

  assert.equal(resource.contentType, 'text/plain;charset=UTF-8');
  assert.equal(resource.contentEncoding, 'UTF-8');
  assert.equal(resource.getContent().toString('utf8'), 'hello');
});

test('a base64 data URI without a media type', () => {
  const resource = parseDataUri('data:;base64,aGVsbG8=');

  assert.equal(resource.contentType, 'text/plain;charset=US-ASCII');
  assert.equal(resource.getContent().toString('utf8'), 'hello');
});

test('a media type without a charset has no content encoding', () => {
  const resource = parseDataUri('data:image/png;base64,AAEC');

  assert.equal(resource.contentType, 'image/png');
  assert.equal(resource.contentEncoding, undefined);
  assert.deepEqual([...resource.getContent()], [0, 1, 2]);
});

test('percent escapes are decoded with the charset of the media type', () => {
  const resource = parseDataUri('data:text/plain;charset=UTF-8,caf%C3%A9');

  assert.equal(resource.getContent().toString('utf8'), 'café');
});

test('the scheme is matched without regard to case', () => {
  assert.equal(parseDataUri('DATA:,x').getContent().toString('ascii'), 'x');
});

test('the fragment is not part of the data', () => {
  assert.equal(parseDataUri('data:,a#b,c').getContent().toString('ascii'), 'a');
});

test('a URI without a comma fails with MISSING_COMMA', () => {
  assert.throws(
    () => parseDataUri('data:text/plain'),
    (error) => isDataUriError(error, 'MISSING_COMMA') && error.message === 'Missing comma in data URI: "data:text/plain"',
  );
});

test('a comma only in the fragment does not count', () => {
  assert.throws(() => parseDataUri('data:text/plain#anchor,'), (error) => isDataUriError(error, 'MISSING_COMMA'));
});

test('long URIs are cut short in the missing comma message', () => {
  const uri = `data:${'a'.repeat(295)}`;

  assert.throws(
    () => parseDataUri(uri),
    (error) => isDataUriError(error, 'MISSING_COMMA') && error.message === `Missing comma in data URI: "${uri.slice(0, 200)}..."`,
  );
});

test('other schemes fail with INVALID_PROTOCOL', () => {
  assert.throws(
    () => parseDataUri('http://example.com/'),
    (error) => isDataUriError(error, 'INVALID_PROTOCOL') && error.message === 'Invalid protocol: expected "data" but got "http"',
  );
  assert.throws(
    () => parseDataUri('hello,world'),
    (error) => isDataUriError(error, 'INVALID_PROTOCOL') && error.message === 'Invalid protocol: expected "data" but the URI has no scheme',
  );
});

test('an invalid MIME type fails with INVALID_MIME_TYPE', () => {
  assert.throws(() => parseDataUri('data:text,abc'), (error) => isDataUriError(error, 'INVALID_MIME_TYPE'));
});

test('an unsupported charset fails for form-encoded data only', () => {
  assert.throws(
    () => parseDataUri('data:text/plain;charset=something+invalid,hello'),
    (error) => isDataUriError(error, 'UNSUPPORTED_CHARSET') && error.message === 'something+invalid',
  );

  const resource = parseDataUri('data:text/plain;charset=something+invalid;base64,aGVsbG8=');
  assert.equal(resource.contentEncoding, 'something+invalid');
  assert.equal(resource.getContent().toString('ascii'), 'hello');
});

test('bad payloads fail with INVALID_BASE64 or INVALID_PERCENT_ENCODING', () => {
  assert.throws(() => parseDataUri('data:application/octet-stream;base64,!!!!'), (error) => isDataUriError(error, 'INVALID_BASE64'));
  assert.throws(() => parseDataUri('data:text/plain,100%'), (error) => isDataUriError(error, 'INVALID_PERCENT_ENCODING'));
});

test('validateDataUri throws what parseDataUri throws', () => {
  assert.doesNotThrow(() => validateDataUri('data:,ok'));
  assert.throws(() => validateDataUri('data:nocomma'), (error) => isDataUriError(error, 'MISSING_COMMA'));
});

test('decodeDataUriBody works on a region of a larger string', () => {
  const body = decodeDataUriBody('xx;base64,aGk=', 2);

  assert.ok(body.mediaType.equals(MediaType.DEFAULT));
  assert.equal(body.content.toString('ascii'), 'hi');
  assert.ok(Object.isFrozen(body));
});

test('getContent returns a copy', () => {
  const resource = parseDataUri('data:,abc');
  resource.getContent().fill(0);

  assert.equal(resource.getContent().toString('ascii'), 'abc');
});

test('openStream yields the content', async () => {
  const resource = parseDataUri('data:;base64,aGVsbG8=');
  const chunks: Buffer[] = [];
  for await (const chunk of resource.openStream()) {
    chunks.push(chunk);
  }

  assert.equal(Buffer.concat(chunks).toString('utf8'), 'hello');
});

test('formatDataUri writes base64 and form-encoded data', () => {
  assert.equal(formatDataUri(undefined, Buffer.from('hello'), true), 'data:;base64,aGVsbG8=');
  assert.equal(formatDataUri(undefined, Buffer.from('hello world'), false), 'data:,hello+world');
  assert.equal(
    formatDataUri(MediaType.parse('text/plain;charset=UTF-8'), Buffer.from('café', 'utf8'), false),
    'data:text/plain;charset=UTF-8,caf%C3%A9',
  );
  assert.equal(
    formatDataUri(MediaType.parse('text/plain; title="a;b"'), Buffer.from('x'), true),
    'data:text/plain;title="a;b";base64,eA==',
  );
});

test('formatted URIs parse back to the same media type and content', () => {
  const mediaType = MediaType.parse('application/json;charset=UTF-8');
  const content = Buffer.from('{"greeting": "grüß dich"}', 'utf8');

  for (const useBase64 of [true, false]) {
    const resource = parseDataUri(formatDataUri(mediaType, content, useBase64));
    assert.ok(resource.mediaType.equals(mediaType));
    assert.deepEqual(resource.getContent(), content);
  }
});

test('getScheme reads the scheme of an absolute URI', () => {
  assert.equal(getScheme('data:,x'), 'data');
  assert.equal(getScheme('svn+ssh://host'), 'svn+ssh');
  assert.equal(getScheme('/relative/path'), undefined);
  assert.equal(getScheme('1abc:x'), undefined);
});

test('a trailing invalid character in base64 data fails with INVALID_BASE64', () => {
  assert.throws(() => parseDataUri('data:;base64,aGVsbG8%'), (error) => isDataUriError(error, 'INVALID_BASE64'));
});

test('data:hello+world#anchor, has no comma before the fragment', () => {
  assert.throws(() => parseDataUri('data:hello+world#anchor,'), (error) => isDataUriError(error, 'MISSING_COMMA'));
});

test('any bytes survive base64 and, in ISO-8859-1, form encoding', () => {
  const everyByte = Buffer.from(Array.from({ length: 256 }, (_, i) => i));
  const mediaTypes = [
    MediaType.parse('application/octet-stream'),
    MediaType.parse('text/plain;charset=ISO-8859-1'),
    MediaType.create('application/x-test', { name: 'a "quoted"; value', charset: 'latin1' }),
  ];

  for (const mediaType of mediaTypes) {
    const base64 = parseDataUri(formatDataUri(mediaType, everyByte, true));
    assert.ok(base64.mediaType.equals(mediaType));
    assert.deepEqual(base64.getContent(), everyByte);
  }

  const form = parseDataUri(formatDataUri(mediaTypes[1], everyByte, false));
  assert.ok(form.mediaType.equals(mediaTypes[1]));
  assert.deepEqual(form.getContent(), everyByte);
});

test('percent escapes are decoded with charsets beyond the Unicode ones', () => {
  const resource = parseDataUri('data:text/plain;charset=windows-1252,caf%E9');

  assert.deepEqual([...resource.getContent()], [0x63, 0x61, 0x66, 0xe9]);
  assert.equal(resource.contentEncoding, 'windows-1252');
});

test('windows-1252 content survives form encoding', () => {
  const mediaType = MediaType.parse('text/plain;charset=windows-1252');
  const content = Buffer.from([0x47, 0x72, 0xfc, 0xdf, 0x65, 0x2c, 0x20, 0x80, 0x20, 0x35, 0x21]);

  const uri = formatDataUri(mediaType, content, false);
  assert.equal(uri, 'data:text/plain;charset=windows-1252,Gr%FC%DFe%2C+%80+5%21');

  const resource = parseDataUri(uri);
  assert.ok(resource.mediaType.equals(mediaType));
  assert.deepEqual(resource.getContent(), content);
});
