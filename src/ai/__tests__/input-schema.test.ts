import test from 'node:test';
import assert from 'node:assert/strict';
import {AnalyzeInputSchema, toAnalyzeOutput, toPayload} from '../schemas/input-schema';

test('AnalyzeInputSchema validates the tool and the image data URI', () => {
  assert.equal(AnalyzeInputSchema.safeParse({tool: 'sym', text: 'dry cough'}).success, true);
  assert.equal(AnalyzeInputSchema.safeParse({tool: 'xray', text: 'dry cough'}).success, false);
  assert.equal(
    AnalyzeInputSchema.safeParse({tool: 'rx', photoDataUri: 'data:application/pdf;base64,JVBERi0='}).success,
    false
  );
});

test('toPayload converts the flow input into a router payload', () => {
  assert.deepEqual(toPayload({photoDataUri: 'data:image/png;base64,aGk=', text: 'note'}), {
    image: {url: 'data:image/png;base64,aGk=', contentType: 'image/png'},
    text: 'note',
  });
  assert.deepEqual(toPayload({text: 'note'}), {image: undefined, text: 'note'});
});

test('toAnalyzeOutput flattens each outcome', () => {
  assert.deepEqual(toAnalyzeOutput({status: 'rejected', message: 'Please describe your symptoms.'}, 'Please describe your symptoms.'), {
    status: 'rejected',
    rawText: '',
    markdown: 'Please describe your symptoms.',
    succeeded: false,
  });
  assert.deepEqual(
    toAnalyzeOutput(
      {
        status: 'completed',
        category: 'Food',
        result: {rawText: '400 kcal', patchedText: '400 kcal', succeeded: true},
      },
      '400 kcal'
    ),
    {
      status: 'completed',
      category: 'Food',
      warning: undefined,
      rawText: '400 kcal',
      markdown: '400 kcal',
      succeeded: true,
      errorDetail: undefined,
    }
  );
});
