import test from 'node:test';
import assert from 'node:assert/strict';
import {imageFromBytes, imageFromDataUri} from '../image';

test('imageFromBytes builds a base64 data URI', () => {
  assert.deepEqual(imageFromBytes(new Uint8Array([104, 105]), 'image/png'), {
    url: 'data:image/png;base64,aGk=',
    contentType: 'image/png',
  });
});

test('imageFromDataUri accepts JPEG and PNG data URIs', () => {
  assert.deepEqual(imageFromDataUri('data:IMAGE/JPEG;base64,/9j/'), {
    url: 'data:image/jpeg;base64,/9j/',
    contentType: 'image/jpeg',
  });
  assert.deepEqual(imageFromDataUri(' data:image/png;base64,aGk= '), {
    url: 'data:image/png;base64,aGk=',
    contentType: 'image/png',
  });
});

test('imageFromDataUri rejects other encodings and malformed input', () => {
  assert.equal(imageFromDataUri('data:application/pdf;base64,JVBERi0='), null);
  assert.equal(imageFromDataUri('data:image/gif;base64,R0lGOD=='), null);
  assert.equal(imageFromDataUri('data:image/png;base64,'), null);
  assert.equal(imageFromDataUri('https://example.com/scan.png'), null);
});
