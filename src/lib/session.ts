import { randomUUID } from 'node:crypto';

import type { Deck } from './deck';
import { DifficultyAdapter } from './difficulty';
import { Scheduler, assertQuality, qualityFromOutcome } from './engine';
import { isDebugEnabled, loadQuizConfig } from './env';
import type { QuizConfig } from './env';
import { ConfigurationError, InvalidAnswerSetError, SessionStateError } from './errors';
import { assertConfidence, withDifficulty } from './item';
import { FuzzyMatcher, caseInsensitiveMatch, exactMatch } from './matching';
import type { FuzzyMatchResult, MatchClassification } from './matching';
import { createRandom } from './random';
import type { RandomSource } from './random';
import { selectNext } from './selection';
import { normalizeForExact, normalizeForFuzzy } from './similarity';
import type { ConfidenceLevel, ID, Item, Quality, QuizMode, ReviewOutcome, Sensitivity } from './types';

export type SessionState = 'starting' | 'in-progress' | 'completed' | 'cancelled';

export type QuestionStatus = 'pending' | 'correct' | 'incorrect' | 'skipped';

export type AnswerChecker = (expected: string, received: string) => boolean;

export interface AskedQuestion {
  number: number;
  item: Item;
  presentedAt: Date;
  answeredAt: Date | null;
  response: string | null;
  status: QuestionStatus;
  quality: Quality | null;
  confidence: ConfidenceLevel | null;
  match: FuzzyMatchResult | null;
  acceptedAnswer: string | null;
  /** Seconds between presentation and answer. */
  responseTime: number | null;
  difficultyDelta: number | null;
}

export interface PresentedQuestion {
  number: number;
  item: Item;
  presentedAt: Date;
}

export interface SubmitOptions {
  quality?: number;
  confidence?: number;
  now?: Date;
}

export interface SubmissionFeedback {
  correct: boolean;
  match: FuzzyMatchResult | null;
  quality: Quality;
  responseTime: number;
  difficultyBefore: number;
  difficultyAfter: number;
  /** Set only when the adaptive override was applied. */
  difficultyDelta: number | null;
  rationale: string | null;
  item: Item;
}

export interface SessionStats {
  asked: number;
  answered: number;
  correct: number;
  incorrect: number;
  skipped: number;
  /** Correct over answered; 0 before the first answer. */
  accuracy: number;
  meanResponseTime: number;
  durationMs: number;
  remaining: number;
}

export interface SessionSummary {
  id: string;
  mode: QuizMode;
  state: SessionState;
  cap: number;
  startedAt: string;
  endedAt: string | null;
  stats: SessionStats;
  questions: {
    number: number;
    itemId: ID;
    prompt: string;
    response: string | null;
    status: QuestionStatus;
    classification: MatchClassification | null;
    acceptedAnswer: string | null;
    quality: Quality | null;
    confidence: ConfidenceLevel | null;
    responseTime: number | null;
    difficultyDelta: number | null;
  }[];
}

export interface QuizSessionOptions {
  id?: string;
  mode?: QuizMode;
  cap?: number;
  fuzzy?: { enabled?: boolean; sensitivity?: Sensitivity };
  answerChecker?: AnswerChecker;
  seed?: number | null;
  random?: RandomSource;
  scheduler?: Scheduler;
  matcher?: FuzzyMatcher;
  adapter?: DifficultyAdapter;
  config?: QuizConfig;
}

type CheckResult = { correct: boolean; match: FuzzyMatchResult | null };

function secondsBetween(from: Date, to: Date): number {
  return Math.max(0, (to.getTime() - from.getTime()) / 1000);
}

export class QuizSession {
  readonly id: string;

  readonly mode: QuizMode;

  readonly cap: number;

  readonly startedAt: Date;

  private state: SessionState;

  private endedAt: Date | null;

  private readonly asked: AskedQuestion[];

  private fuzzyEnabled: boolean;

  private readonly matcher: FuzzyMatcher;

  private readonly scheduler: Scheduler;

  private readonly adapter: DifficultyAdapter;

  private readonly random: RandomSource;

  private readonly answerChecker: AnswerChecker | null;

  constructor(private readonly deck: Deck, options: QuizSessionOptions = {}, now: Date = new Date()) {
    const config = options.config ?? loadQuizConfig();
    const cap = options.cap ?? config.maxQuestions;
    if (!Number.isInteger(cap) || cap < 1) {
      throw new ConfigurationError(`A session needs a question cap of at least 1, received ${cap}.`);
    }

    this.id = options.id ?? randomUUID();
    this.mode = options.mode ?? config.mode;
    this.cap = cap;
    this.startedAt = new Date(now.getTime());
    this.state = 'starting';
    this.endedAt = null;
    this.asked = [];
    this.fuzzyEnabled = options.fuzzy?.enabled ?? config.fuzzyMatching;
    this.matcher = options.matcher ?? new FuzzyMatcher(options.fuzzy?.sensitivity ?? config.sensitivity);
    this.scheduler = options.scheduler ?? new Scheduler();
    this.adapter = options.adapter ?? new DifficultyAdapter();
    this.random = options.random ?? createRandom(options.seed ?? config.randomSeed);
    this.answerChecker = options.answerChecker ?? null;
  }

  get status(): SessionState {
    return this.state;
  }

  get fuzzyMatching(): { enabled: boolean; sensitivity: Sensitivity } {
    return { enabled: this.fuzzyEnabled, sensitivity: this.matcher.sensitivity };
  }

  questions(): readonly AskedQuestion[] {
    return this.asked.map((question) => ({ ...question }));
  }

  next(now: Date = new Date()): PresentedQuestion | null {
    if (this.isFinished()) return null;

    const pending = this.pending();
    if (pending) {
      return { number: pending.number, item: pending.item, presentedAt: pending.presentedAt };
    }

    if (this.asked.length >= this.cap) {
      this.finish('completed', now);
      return null;
    }

    const item = selectNext(this.pool(now), this.mode, now, this.random);
    if (!item) {
      this.finish('completed', now);
      return null;
    }

    const question: AskedQuestion = {
      number: this.asked.length + 1,
      item,
      presentedAt: new Date(now.getTime()),
      answeredAt: null,
      response: null,
      status: 'pending',
      quality: null,
      confidence: null,
      match: null,
      acceptedAnswer: null,
      responseTime: null,
      difficultyDelta: null,
    };
    this.asked.push(question);
    this.state = 'in-progress';
    return { number: question.number, item, presentedAt: question.presentedAt };
  }

  submit(item: Item, rawText: string, options: SubmitOptions = {}): SubmissionFeedback {
    const now = options.now ?? new Date();
    const question = this.requirePending(item.id);
    const current = this.deck.find(item.id);
    if (!current) {
      throw new SessionStateError(`Item ${item.id} is no longer in the deck.`);
    }
    if (current.acceptedAnswers.length === 0) {
      throw new InvalidAnswerSetError(`Item ${current.id} has no accepted answers.`);
    }

    const explicitQuality = options.quality === undefined ? null : assertQuality(options.quality);
    const confidence = options.confidence === undefined ? null : assertConfidence(options.confidence);

    const response = rawText.trim();
    const { correct, match } = this.check(current, response);
    const responseTime = secondsBetween(question.presentedAt, now);
    const quality = explicitQuality ?? qualityFromOutcome(correct, responseTime);

    let updated = this.scheduler.recordOutcome(current, { correct, quality, responseTime, confidence }, now);
    const baseline = updated.difficulty;

    let difficultyDelta: number | null = null;
    let rationale: string | null = null;
    if (updated.reviewCount >= this.adapter.minimumReviews) {
      const recent: ReviewOutcome[] = [...this.recentOutcomes(updated.id), { correct }];
      const proposal = this.adapter.propose(updated, recent, confidence);
      if (this.adapter.shouldAdjust(updated, proposal.metrics) && proposal.difficulty !== baseline) {
        updated = withDifficulty(updated, proposal.difficulty, proposal.rationale, now);
        difficultyDelta = proposal.delta;
        rationale = proposal.rationale;
        this.debug(`${updated.id}: ${baseline.toFixed(3)} -> ${updated.difficulty.toFixed(3)} (${rationale})`);
      }
    }

    this.deck.commit(updated);

    question.item = updated;
    question.answeredAt = new Date(now.getTime());
    question.response = response;
    question.status = correct ? 'correct' : 'incorrect';
    question.quality = quality;
    question.confidence = confidence;
    question.match = match;
    question.acceptedAnswer = match?.matchedAnswer ?? null;
    question.responseTime = responseTime;
    question.difficultyDelta = difficultyDelta;
    this.completeIfCapped(now);

    return {
      correct,
      match,
      quality,
      responseTime,
      difficultyBefore: current.difficulty,
      difficultyAfter: updated.difficulty,
      difficultyDelta,
      rationale,
      item: updated,
    };
  }

  skip(item: Item, now: Date = new Date()): void {
    const question = this.requirePending(item.id);
    question.status = 'skipped';
    question.answeredAt = new Date(now.getTime());
    this.completeIfCapped(now);
  }

  /** Stops presenting questions. Items already committed keep their new state. */
  cancel(now: Date = new Date()): boolean {
    if (this.isFinished()) return false;
    this.finish('cancelled', now);
    return true;
  }

  setFuzzyMatching(enabled: boolean, sensitivity?: Sensitivity): void {
    this.fuzzyEnabled = enabled;
    if (sensitivity) {
      this.matcher.setSensitivity(sensitivity);
    }
  }

  suggestionFor(item: Item, rawText: string): string | null {
    if (!this.fuzzyEnabled || item.acceptedAnswers.length === 0) return null;
    const result = this.matcher.match(rawText, item.acceptedAnswers);
    return this.matcher.shouldSuggest(result) ? result.suggestion : null;
  }

  stats(now: Date = new Date()): SessionStats {
    let correct = 0;
    let incorrect = 0;
    let skipped = 0;
    let totalTime = 0;
    for (const question of this.asked) {
      if (question.status === 'correct') correct += 1;
      else if (question.status === 'incorrect') incorrect += 1;
      else if (question.status === 'skipped') skipped += 1;
      if (question.status === 'correct' || question.status === 'incorrect') {
        totalTime += question.responseTime ?? 0;
      }
    }
    const answered = correct + incorrect;
    const end = this.endedAt ?? now;

    return {
      asked: this.asked.length,
      answered,
      correct,
      incorrect,
      skipped,
      accuracy: answered === 0 ? 0 : correct / answered,
      meanResponseTime: answered === 0 ? 0 : totalTime / answered,
      durationMs: Math.max(0, end.getTime() - this.startedAt.getTime()),
      remaining: this.isFinished() ? 0 : Math.max(0, this.cap - this.asked.length),
    };
  }

  summary(now: Date = new Date()): SessionSummary {
    return {
      id: this.id,
      mode: this.mode,
      state: this.state,
      cap: this.cap,
      startedAt: this.startedAt.toISOString(),
      endedAt: this.endedAt ? this.endedAt.toISOString() : null,
      stats: this.stats(now),
      questions: this.asked.map((question) => ({
        number: question.number,
        itemId: question.item.id,
        prompt: question.item.prompt,
        response: question.response,
        status: question.status,
        classification: question.match?.classification ?? null,
        acceptedAnswer: question.acceptedAnswer,
        quality: question.quality,
        confidence: question.confidence,
        responseTime: question.responseTime,
        difficultyDelta: question.difficultyDelta,
      })),
    };
  }

  private check(item: Item, response: string): CheckResult {
    const answers = item.acceptedAnswers;

    const verbatim = answers.find((answer) => normalizeForExact(answer) === response);
    if (verbatim !== undefined) {
      return { correct: true, match: exactMatch(verbatim) };
    }
    const lowered = normalizeForFuzzy(response);
    const caseless = answers.find((answer) => normalizeForFuzzy(answer) === lowered);
    if (caseless !== undefined) {
      return { correct: true, match: caseInsensitiveMatch(caseless) };
    }

    if (this.answerChecker && response !== '') {
      const checker = this.answerChecker;
      if (answers.some((answer) => checker(answer, response))) {
        return { correct: true, match: null };
      }
    }

    if (!this.fuzzyEnabled) {
      return { correct: false, match: null };
    }

    const match = this.matcher.match(response, answers);
    return { correct: this.matcher.shouldAutoAccept(match), match };
  }

  /** Items not asked yet. Spaced mode asks the deck for due items first and falls back to all of them. */
  private pool(now: Date): Item[] {
    const askedIds = new Set(this.asked.map((question) => question.item.id));
    const unasked = (items: readonly Item[]) => items.filter((item) => !askedIds.has(item.id));
    if (this.mode === 'spaced') {
      const due = unasked(this.deck.due(now));
      if (due.length > 0) return due;
    }
    return unasked(this.deck.items());
  }

  /** Outcomes already recorded for `id` in this session, oldest first. */
  private recentOutcomes(id: ID): ReviewOutcome[] {
    const outcomes: ReviewOutcome[] = [];
    for (const question of this.asked) {
      if (question.item.id !== id) continue;
      if (question.status !== 'correct' && question.status !== 'incorrect') continue;
      outcomes.push({ correct: question.status === 'correct' });
    }
    return outcomes;
  }

  private pending(): AskedQuestion | undefined {
    const last = this.asked[this.asked.length - 1];
    return last && last.status === 'pending' ? last : undefined;
  }

  private requirePending(id: ID): AskedQuestion {
    if (this.isFinished()) {
      throw new SessionStateError(`Session ${this.id} is ${this.state}.`);
    }
    const pending = this.pending();
    if (!pending || pending.item.id !== id) {
      throw new SessionStateError(`Item ${id} is not the question currently being asked.`);
    }
    return pending;
  }

  private completeIfCapped(now: Date): void {
    if (this.asked.length >= this.cap) {
      this.finish('completed', now);
    }
  }

  private isFinished(): boolean {
    return this.state === 'completed' || this.state === 'cancelled';
  }

  private finish(state: 'completed' | 'cancelled', now: Date): void {
    this.state = state;
    this.endedAt = new Date(now.getTime());
  }

  private debug(message: string): void {
    if (isDebugEnabled()) {
      console.debug(`[cardwise] ${message}`);
    }
  }
}
