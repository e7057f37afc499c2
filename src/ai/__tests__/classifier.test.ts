import test from 'node:test';
import assert from 'node:assert/strict';
import {CLASSIFICATION_PROMPT, createClassifier, normalizeCategory} from '../classifier';
import type {ModelAttachments, ModelError, ModelGateway} from '../model-gateway';
import {imageFromBytes} from '../../lib/image';
import {err, ok, type Result} from '../../lib/result';

type Call = {prompt: string; attachments?: ModelAttachments};

function stubGateway(reply: Result<string, ModelError>) {
  const calls: Call[] = [];
  const gateway: ModelGateway = {
    async generate(prompt, attachments) {
      calls.push({prompt, attachments});
      return reply;
    },
  };
  return {gateway, calls};
}

test('normalizeCategory maps lab/report wording to LabReport', () => {
  for (const raw of ['LabReport', 'lab', 'This is a blood REPORT.', 'Looks like a Lab result', 'collaboration']) {
    assert.equal(normalizeCategory(raw), 'LabReport', raw);
  }
});

test('normalizeCategory applies rules in order', () => {
  assert.equal(normalizeCategory('A report describing a symptom'), 'LabReport');
  assert.equal(normalizeCategory('Prescription for a lab test'), 'Prescription');
  assert.equal(normalizeCategory('medicine for pain'), 'Prescription');
  assert.equal(normalizeCategory('A meal with a cough drop'), 'Food');
  assert.equal(normalizeCategory('Symptoms'), 'Symptoms');
  assert.equal(normalizeCategory('persistent fever'), 'Symptoms');
});

test('normalizeCategory falls back to Unknown', () => {
  assert.equal(normalizeCategory(''), 'Unknown');
  assert.equal(normalizeCategory('Unknown'), 'Unknown');
  assert.equal(normalizeCategory('a photo of a cat'), 'Unknown');
});

test('createClassifier sends the fixed prompt with the supplied image and text', async () => {
  const {gateway, calls} = stubGateway(ok('Prescription'));
  const classify = createClassifier(gateway);
  const image = imageFromBytes(new Uint8Array([1, 2, 3]), 'image/png');

  assert.equal(await classify(image, '  my note  '), 'Prescription');
  assert.equal(calls.length, 1);
  assert.equal(calls[0].prompt, CLASSIFICATION_PROMPT);
  assert.deepEqual(calls[0].attachments, {image, text: 'my note'});
});

test('createClassifier tolerates a chatty answer', async () => {
  const {gateway} = stubGateway(ok('Sure! This appears to be a **lab report** showing blood values.'));
  assert.equal(await createClassifier(gateway)(undefined, 'CBC results'), 'LabReport');
});

test('createClassifier returns Unknown when the model is unavailable', async () => {
  const {gateway, calls} = stubGateway(err<ModelError>({code: 'model_unavailable', detail: 'boom', attempts: 2}));
  assert.equal(await createClassifier(gateway)(undefined, 'cough for a week'), 'Unknown');
  assert.equal(calls.length, 1);
});

test('createClassifier skips the model when there is nothing to classify', async () => {
  const {gateway, calls} = stubGateway(ok('Food'));
  assert.equal(await createClassifier(gateway)(undefined, '   '), 'Unknown');
  assert.equal(calls.length, 0);
});
