/**
 * In-process adapter fakes for driving CallSession without providers.
 * Each call is recorded with a deferred result the test settles by hand.
 */

import type { Utterance } from '@/modules/audio';
import type { TranscriptionAdapter } from '@/modules/stt';
import type { ConversationHistory, ResponseAdapter } from '@/modules/llm';
import type { SynthesisAdapter } from '@/modules/tts';
import { CallSession } from '@/modules/call';
import type { CallSessionConfig, OutboundItem, OutboundAudioQueue } from '@/modules/call';
import type { TurnToken } from '@/shared/utils';
import { makeFrame, repeat } from './audio';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Let every pending promise continuation run
 */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class FakeTranscriber implements TranscriptionAdapter {
  readonly calls: { utterance: Utterance; token: TurnToken; result: Deferred<string> }[] = [];

  transcribe(utterance: Utterance, token: TurnToken): Promise<string> {
    const result = deferred<string>();
    this.calls.push({ utterance, token, result });
    return result.promise;
  }

  get last() {
    const call = this.calls[this.calls.length - 1];
    if (!call) {
      throw new Error('transcribe was not called');
    }
    return call;
  }
}

export class FakeResponder implements ResponseAdapter {
  readonly calls: {
    history: ConversationHistory;
    token: TurnToken;
    result: Deferred<string | AsyncIterable<string>>;
  }[] = [];

  generate(history: ConversationHistory, token: TurnToken): Promise<string | AsyncIterable<string>> {
    const result = deferred<string | AsyncIterable<string>>();
    this.calls.push({ history, token, result });
    return result.promise;
  }

  get last() {
    const call = this.calls[this.calls.length - 1];
    if (!call) {
      throw new Error('generate was not called');
    }
    return call;
  }
}

type SynthesisResult = Buffer | AsyncIterable<Buffer>;

/**
 * Answers immediately with the text's bytes unless `respond` is replaced
 */
export class FakeSynthesizer implements SynthesisAdapter {
  readonly texts: string[] = [];
  readonly tokens: TurnToken[] = [];
  respond: (text: string) => Promise<SynthesisResult> = async (text) => Buffer.from(text);

  constructor(readonly sampleRate = 24000) {}

  synthesize(text: string, token: TurnToken): Promise<SynthesisResult> {
    this.texts.push(text);
    this.tokens.push(token);
    return this.respond(text);
  }
}

export const testCallConfig: CallSessionConfig = {
  segment: { speechDebounceFrames: 2, silenceTrailFrames: 3, maxUtteranceMs: 20000, preRollFrames: 2 },
  minUtteranceMs: 100,
  idleFlushMs: 1000,
  turnDeadlineMs: 30000,
  streamingSynthesis: false,
  bargeInEnabled: true,
  maxPendingUtterances: 10,
};

export interface SessionFixture {
  session: CallSession;
  transcriber: FakeTranscriber;
  responder: FakeResponder;
  synthesizer: FakeSynthesizer;
  /** Feed frames following the pattern, continuing the sequence */
  send(pattern: boolean[]): void;
  /** Speech followed by enough silence to close the utterance */
  speak(speechFrames?: number): void;
}

export function createSessionFixture(
  overrides: Partial<CallSessionConfig> = {},
  callId = 'call-test'
): SessionFixture {
  const transcriber = new FakeTranscriber();
  const responder = new FakeResponder();
  const synthesizer = new FakeSynthesizer();
  const config = { ...testCallConfig, ...overrides };
  const session = new CallSession(callId, { transcriber, responder, synthesizer }, config);
  let sequence = 0;

  const send = (pattern: boolean[]): void => {
    for (const speech of pattern) {
      session.onAudioFrame(makeFrame(sequence++, speech));
    }
  };

  return {
    session,
    transcriber,
    responder,
    synthesizer,
    send,
    speak: (speechFrames = 6) =>
      send([...repeat(true, speechFrames), ...repeat(false, config.segment.silenceTrailFrames)]),
  };
}

/**
 * Pull everything currently queued without waiting for more
 */
export async function takeQueued(queue: OutboundAudioQueue): Promise<OutboundItem[]> {
  const items: OutboundItem[] = [];
  while (queue.size > 0) {
    const result = await queue.next();
    if (!result.done) {
      items.push(result.value);
    }
  }
  return items;
}
