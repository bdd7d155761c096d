import { z } from 'zod';

import { ConfigurationError } from './errors';
import { normalizeSeed } from './random';
import { QUIZ_MODES, SENSITIVITIES } from './types';
import type { QuizMode, Sensitivity } from './types';

export const DEFAULT_MAX_QUESTIONS = 50;

export interface QuizConfig {
  maxQuestions: number;
  mode: QuizMode;
  fuzzyMatching: boolean;
  sensitivity: Sensitivity;
  randomSeed: number | null;
}

export const DEFAULT_QUIZ_CONFIG: Readonly<QuizConfig> = {
  maxQuestions: DEFAULT_MAX_QUESTIONS,
  mode: 'spaced',
  fuzzyMatching: true,
  sensitivity: 'medium',
  randomSeed: null,
};

type Env = Record<string, string | undefined>;

const TRUE_WORDS = ['true', '1', 'on', 'yes'];
const BOOLEAN_WORDS = [...TRUE_WORDS, 'false', '0', 'off', 'no'];

const maxQuestionsSchema = z.coerce.number().int().positive();
const modeSchema = z.string().refine((value): value is QuizMode => QUIZ_MODES.some((mode) => mode === value), {
  message: `expected one of ${QUIZ_MODES.join(', ')}`,
});
const sensitivitySchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .refine((value): value is Sensitivity => SENSITIVITIES.some((name) => name === value), {
    message: `expected one of ${SENSITIVITIES.join(', ')}`,
  });
const booleanSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .refine((value) => BOOLEAN_WORDS.includes(value), { message: `expected one of ${BOOLEAN_WORDS.join(', ')}` })
  .transform((value) => TRUE_WORDS.includes(value));
const seedSchema = z.coerce.number().int().transform(normalizeSeed);

const warned = new Set<string>();

function readVar(env: Env, name: string): string | null {
  const value = env[name];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function readSetting<T>(env: Env, name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  const raw = readVar(env, name);
  if (raw === null) return fallback;

  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const reason = parsed.error.issues[0]?.message ?? 'invalid value';
  if (env.NODE_ENV === 'production') {
    throw new ConfigurationError(`${name} has an invalid value '${raw}': ${reason}.`);
  }
  if (!warned.has(name)) {
    console.warn(`${name} has an invalid value '${raw}' (${reason}). Using the default instead.`);
    warned.add(name);
  }
  return fallback;
}

export function parseRandomSeed(env: Env = process.env): number | null {
  return readSetting<number | null>(env, 'CARDWISE_RANDOM_SEED', seedSchema, null);
}

export function loadQuizConfig(env: Env = process.env): QuizConfig {
  return {
    maxQuestions: readSetting(env, 'CARDWISE_MAX_QUESTIONS', maxQuestionsSchema, DEFAULT_QUIZ_CONFIG.maxQuestions),
    mode: readSetting(env, 'CARDWISE_QUIZ_MODE', modeSchema, DEFAULT_QUIZ_CONFIG.mode),
    fuzzyMatching: readSetting(env, 'CARDWISE_FUZZY_MATCHING', booleanSchema, DEFAULT_QUIZ_CONFIG.fuzzyMatching),
    sensitivity: readSetting(env, 'CARDWISE_FUZZY_SENSITIVITY', sensitivitySchema, DEFAULT_QUIZ_CONFIG.sensitivity),
    randomSeed: parseRandomSeed(env),
  };
}

export function isDebugEnabled(env: Env = process.env): boolean {
  const raw = readVar(env, 'CARDWISE_DEBUG');
  return raw !== null && TRUE_WORDS.includes(raw.toLowerCase());
}
