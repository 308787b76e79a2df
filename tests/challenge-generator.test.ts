import { describe, expect, it } from 'vitest';
import {
  CHALLENGE_OPTION_COUNT,
  answersMatch,
  generateChallenge,
  generateOptions,
  randomInt,
} from '../src/moderation/challenge-generator';
import { seededRandom } from './support/fakes';

function evaluate(question: string): number {
  const match = /^(\d+) ([+×]) (\d+) = \?$/.exec(question);
  if (!match) throw new Error(`unexpected question: ${question}`);
  const left = Number(match[1]);
  const right = Number(match[3]);
  return match[2] === '+' ? left + right : left * right;
}

describe('challenge generator', () => {
  it('builds questions whose answer is among four unique options', () => {
    for (const difficulty of ['easy', 'medium', 'hard'] as const) {
      for (let seed = 1; seed <= 20; seed += 1) {
        const challenge = generateChallenge(difficulty, seededRandom(seed));

        expect(Number(challenge.answer)).toBe(evaluate(challenge.question));
        expect(challenge.options).toHaveLength(CHALLENGE_OPTION_COUNT);
        expect(new Set(challenge.options).size).toBe(CHALLENGE_OPTION_COUNT);
        expect(challenge.options).toContain(Number(challenge.answer));
      }
    }
  });

  it('keeps operands inside the difficulty ranges', () => {
    for (let seed = 1; seed <= 20; seed += 1) {
      const easy = evaluate(generateChallenge('easy', seededRandom(seed)).question);
      const medium = evaluate(generateChallenge('medium', seededRandom(seed)).question);
      const hard = evaluate(generateChallenge('hard', seededRandom(seed)).question);

      expect(easy).toBeGreaterThanOrEqual(2);
      expect(easy).toBeLessThanOrEqual(18);
      expect(medium).toBeGreaterThanOrEqual(11);
      expect(medium).toBeLessThanOrEqual(50);
      expect(hard).toBeGreaterThanOrEqual(20);
      expect(hard).toBeLessThanOrEqual(270);
    }
  });

  it('keeps options inside the range', () => {
    const options = generateOptions(2, 2, 18, 4, seededRandom(7));

    expect(options).toHaveLength(4);
    expect(options.every((option) => option >= 2 && option <= 18)).toBe(true);
  });

  it('draws integers across the inclusive range', () => {
    expect(randomInt(1, 9, () => 0)).toBe(1);
    expect(randomInt(1, 9, () => 0.999)).toBe(9);
  });

  it('compares answers ignoring case and surrounding spaces', () => {
    expect(answersMatch(' 12 ', '12')).toBe(true);
    expect(answersMatch('Abc', 'abc')).toBe(true);
    expect(answersMatch('13', '12')).toBe(false);
  });
});
