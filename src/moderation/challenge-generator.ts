import { CaptchaDifficulty } from '../types';

export type RandomSource = () => number;

export interface GeneratedChallenge {
  question: string;
  answer: string;
  options: number[];
}

interface DifficultyProfile {
  build(random: RandomSource): { question: string; answer: number };
  optionRange: readonly [number, number];
}

export const CHALLENGE_OPTION_COUNT = 4;
const NEAR_ATTEMPTS = 100;
const FILL_ATTEMPTS = 1_000;

export function randomInt(min: number, max: number, random: RandomSource): number {
  return min + Math.floor(random() * (max - min + 1));
}

const PROFILES: Record<CaptchaDifficulty, DifficultyProfile> = {
  easy: {
    build(random) {
      const a = randomInt(1, 9, random);
      const b = randomInt(1, 9, random);
      return { question: `${a} + ${b} = ?`, answer: a + b };
    },
    optionRange: [2, 18],
  },
  medium: {
    build(random) {
      const a = randomInt(10, 30, random);
      const b = randomInt(1, 20, random);
      return { question: `${a} + ${b} = ?`, answer: a + b };
    },
    optionRange: [11, 50],
  },
  hard: {
    build(random) {
      const a = randomInt(10, 30, random);
      const b = randomInt(2, 9, random);
      return { question: `${a} × ${b} = ?`, answer: a * b };
    },
    optionRange: [20, 270],
  },
};

function shuffle<T>(items: T[], random: RandomSource): T[] {
  const result = [...items];
  for (let index = result.length - 1; index > 0; index -= 1) {
    const swapIndex = randomInt(0, index, random);
    const current = result[index];
    const swapped = result[swapIndex];
    if (current === undefined || swapped === undefined) continue;
    result[index] = swapped;
    result[swapIndex] = current;
  }
  return result;
}

export function generateOptions(
  correct: number,
  min: number,
  max: number,
  count: number = CHALLENGE_OPTION_COUNT,
  random: RandomSource = Math.random,
): number[] {
  const options = new Set<number>([correct]);
  const delta = Math.max(1, Math.trunc(correct * 0.3));

  for (let attempt = 0; attempt < NEAR_ATTEMPTS && options.size < count; attempt += 1) {
    const wrong = correct + randomInt(-delta, delta, random);
    if (wrong >= min && wrong <= max && wrong !== correct) {
      options.add(wrong);
    }
  }

  for (let attempt = 0; attempt < FILL_ATTEMPTS && options.size < count; attempt += 1) {
    const wrong = randomInt(min, max, random);
    if (wrong !== correct) {
      options.add(wrong);
    }
  }

  return shuffle([...options].sort((left, right) => left - right), random);
}

export function generateChallenge(
  difficulty: CaptchaDifficulty,
  random: RandomSource = Math.random,
): GeneratedChallenge {
  const profile = PROFILES[difficulty];
  const { question, answer } = profile.build(random);
  const [min, max] = profile.optionRange;

  return {
    question,
    answer: String(answer),
    options: generateOptions(answer, min, max, CHALLENGE_OPTION_COUNT, random),
  };
}

export function answersMatch(given: string, expected: string): boolean {
  return given.trim().toLowerCase() === expected.trim().toLowerCase();
}
