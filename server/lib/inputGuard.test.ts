import { describe, expect, it } from 'vitest';
import { checkQuestion, UNCLEAR_QUESTION_MESSAGE } from './inputGuard.js';

describe('checkQuestion', () => {
  it.each(['', 'ab', '  hi  ', 'Dog', 'TEST', 'hello'])('rejects %j', question => {
    expect(checkQuestion(question)).toEqual({ accepted: false, message: UNCLEAR_QUESTION_MESSAGE });
  });

  it('accepts and trims real questions', () => {
    expect(checkQuestion('  Show vendor payments  ')).toEqual({ accepted: true, question: 'Show vendor payments' });
    expect(checkQuestion('dogs')).toEqual({ accepted: true, question: 'dogs' });
  });
});
