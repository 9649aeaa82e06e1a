/**
 * Call Session
 * Per-call state machine: segmentation → transcription → generation →
 * synthesis → outbound playback
 *
 * All transitions run synchronously inside the session's handlers. Adapter
 * work runs as detached tasks that re-enter only through the guarded on*
 * operations, which drop results tagged with a stale generation id.
 */

import { logger, isTurnCancelled } from '@/shared/utils';
import type { LogSink, TurnToken } from '@/shared/utils';
import { EnergyVoiceActivityDetector, SegmentBuffer } from '@/modules/audio';
import type { AudioFrame, SegmentEvent, Utterance } from '@/modules/audio';
import { GenerationError, SpeechFragmentChunker } from '@/modules/llm';
import type { ConversationHistory, ConversationTurn, Speaker } from '@/modules/llm';
import { CallState } from '../types';
import type {
  CallIdentifier,
  CallSessionConfig,
  CallSessionDependencies,
  CallSessionMetrics,
} from '../types';
import { OutboundAudioQueue } from './outbound-queue.service';

type TurnStage = 'transcription' | 'generation' | 'synthesis';

/**
 * Work owned by the turn currently in flight
 */
interface ActiveTurn {
  readonly generationId: number;
  readonly utteranceId: string;
  readonly controller: AbortController;
  readonly token: TurnToken;
  readonly chunker: SpeechFragmentChunker;
  /** Fragments are synthesized one after another on this chain */
  synthesisChain: Promise<void>;
  responseComplete: boolean;
  synthesisDone: boolean;
  failed: boolean;
  chunkIndex: number;
  deadline: NodeJS.Timeout | null;
}

const validTransitions: Record<CallState, CallState[]> = {
  [CallState.IDLE]: [CallState.LISTENING, CallState.TRANSCRIBING, CallState.ENDED],
  [CallState.LISTENING]: [CallState.IDLE, CallState.TRANSCRIBING, CallState.ENDED],
  [CallState.TRANSCRIBING]: [CallState.LISTENING, CallState.GENERATING, CallState.ENDED],
  [CallState.GENERATING]: [CallState.SYNTHESIZING, CallState.LISTENING, CallState.ENDED],
  [CallState.SYNTHESIZING]: [
    CallState.SPEAKING,
    CallState.LISTENING,
    CallState.IDLE,
    CallState.ENDED,
  ],
  [CallState.SPEAKING]: [CallState.IDLE, CallState.LISTENING, CallState.ENDED],
  [CallState.ENDED]: [],
};

const REPLY_STATES = [CallState.GENERATING, CallState.SYNTHESIZING, CallState.SPEAKING];
const AUDIO_STATES = [CallState.SYNTHESIZING, CallState.SPEAKING];

/**
 * Text with at least one letter or digit
 */
export function isIntelligible(text: string): boolean {
  return /[\p{L}\p{N}]/u.test(text);
}

export class CallSession {
  readonly id: CallIdentifier;
  readonly createdAt = Date.now();
  readonly outbound = new OutboundAudioQueue();

  private currentState: CallState = CallState.IDLE;
  private generation = 0;
  private turn: ActiveTurn | null = null;
  private readonly turns: ConversationTurn[] = [];
  private pending: Utterance[] = [];
  private lastSequence = -1;
  private idleFlushTimer: NodeJS.Timeout | null = null;
  private readonly segmentBuffer: SegmentBuffer;
  private readonly log: LogSink;

  private readonly stats: CallSessionMetrics = {
    framesReceived: 0,
    framesDropped: 0,
    utterancesDetected: 0,
    utterancesDiscarded: 0,
    turnsStarted: 0,
    turnsCompleted: 0,
    turnsFailed: 0,
    bargeIns: 0,
    chunksQueued: 0,
    staleResultsDropped: 0,
  };

  constructor(
    id: CallIdentifier,
    private readonly deps: CallSessionDependencies,
    private readonly config: CallSessionConfig
  ) {
    this.id = id;
    this.log = logger.child({ callId: id });
    this.segmentBuffer = new SegmentBuffer(
      config.segment,
      deps.vad ?? new EnergyVoiceActivityDetector()
    );
  }

  get state(): CallState {
    return this.currentState;
  }

  get isEnded(): boolean {
    return this.currentState === CallState.ENDED;
  }

  /**
   * Current generation id; results tagged with any other id are stale
   */
  get generationId(): number {
    return this.generation;
  }

  /**
   * Frozen copy; later turns never show up in a snapshot taken earlier
   */
  get history(): ConversationHistory {
    return Object.freeze([...this.turns]);
  }

  get pendingUtteranceCount(): number {
    return this.pending.length;
  }

  get metrics(): CallSessionMetrics {
    return { ...this.stats };
  }

  // ---------------------------------------------------------------------------
  // Inbound audio
  // ---------------------------------------------------------------------------

  onAudioFrame(frame: AudioFrame): void {
    if (this.isEnded) {
      this.stats.framesDropped++;
      this.log.debug('Frame after call end ignored', { sequence: frame.sequence });
      return;
    }

    if (frame.sequence <= this.lastSequence) {
      this.stats.framesDropped++;
      this.log.warn('Out-of-order frame dropped', {
        sequence: frame.sequence,
        lastSequence: this.lastSequence,
      });
      return;
    }

    if (this.lastSequence >= 0 && frame.sequence > this.lastSequence + 1) {
      this.log.debug('Frame gap', { missing: frame.sequence - this.lastSequence - 1 });
    }

    this.lastSequence = frame.sequence;
    this.stats.framesReceived++;

    const event = this.segmentBuffer.push(frame);
    this.armIdleFlush();
    if (event) {
      this.handleSegmentEvent(event);
    }
  }

  // ---------------------------------------------------------------------------
  // Adapter results
  // ---------------------------------------------------------------------------

  onTranscriptReady(text: string, generationId: number): boolean {
    const turn = this.currentTurn(generationId, [CallState.TRANSCRIBING]);
    if (!turn) {
      return this.dropStale('transcript', generationId);
    }

    const transcript = text.trim();
    if (!isIntelligible(transcript)) {
      this.log.debug('Empty transcript, turn dropped', { generationId });
      this.finishTurn(CallState.LISTENING, true);
      return true;
    }

    this.appendTurn('user', transcript);
    this.transition(CallState.GENERATING);
    void this.runGeneration(turn);
    return true;
  }

  onResponseFragment(fragment: string, generationId: number): boolean {
    const turn = this.currentTurn(generationId, REPLY_STATES);
    if (!turn || turn.failed || turn.responseComplete) {
      return this.dropStale('response fragment', generationId);
    }

    if (this.config.streamingSynthesis) {
      for (const speakable of turn.chunker.push(fragment)) {
        this.queueSynthesis(turn, speakable);
      }
    }
    return true;
  }

  onResponseComplete(fullText: string, generationId: number): boolean {
    const turn = this.currentTurn(generationId, REPLY_STATES);
    if (!turn || turn.failed || turn.responseComplete) {
      return this.dropStale('response', generationId);
    }

    const reply = fullText.trim();
    const rest = this.config.streamingSynthesis ? turn.chunker.flush() : reply;
    if (rest) {
      this.queueSynthesis(turn, rest);
    }

    // Still generating: no fragment of the reply was speakable
    if (this.currentState === CallState.GENERATING) {
      this.failTurn(turn, 'generation', new GenerationError('Reply was empty'));
      return true;
    }

    turn.responseComplete = true;
    this.appendTurn('assistant', reply);

    turn.synthesisChain = turn.synthesisChain.then(() => this.onSynthesisFinished(generationId));
    return true;
  }

  onAudioChunkReady(chunk: Buffer, generationId: number): boolean {
    const turn = this.currentTurn(generationId, AUDIO_STATES);
    if (!turn || turn.failed) {
      return this.dropStale('audio chunk', generationId);
    }

    this.outbound.push({
      type: 'audio',
      generationId,
      index: turn.chunkIndex++,
      audio: chunk,
      sampleRate: this.deps.synthesizer.sampleRate,
    });
    this.stats.chunksQueued++;

    if (this.currentState === CallState.SYNTHESIZING) {
      this.transition(CallState.SPEAKING);
    }
    return true;
  }

  /**
   * The transport finished playing everything queued for the turn
   */
  onOutboundDrained(generationId?: number): void {
    const turn = this.turn;
    if (this.currentState !== CallState.SPEAKING || !turn) {
      this.log.debug('Drain outside speaking ignored', { state: this.currentState });
      return;
    }
    if (generationId !== undefined && generationId !== turn.generationId) {
      this.dropStale('drain', generationId);
      return;
    }
    if (!turn.synthesisDone || this.outbound.pendingAudio > 0) {
      this.log.debug('Drain before synthesis finished ignored', {
        generationId: turn.generationId,
      });
      return;
    }

    if (!turn.failed) {
      this.stats.turnsCompleted++;
    }
    this.finishTurn(this.segmentBuffer.isInSpeech ? CallState.LISTENING : CallState.IDLE, false);
  }

  /**
   * Terminal: cancel in-flight work and release everything the call owns
   */
  end(reason = 'ended'): boolean {
    if (this.isEnded) {
      return false;
    }

    this.clearIdleFlush();
    if (this.turn) {
      this.releaseTurn(this.turn, true);
    }
    this.generation++;
    this.pending = [];
    this.segmentBuffer.reset();
    this.outbound.close();
    this.transition(CallState.ENDED);

    this.log.info('Call session ended', {
      reason,
      durationMs: Date.now() - this.createdAt,
      metrics: this.stats,
    });
    return true;
  }

  // ---------------------------------------------------------------------------
  // Segmentation
  // ---------------------------------------------------------------------------

  private handleSegmentEvent(event: SegmentEvent): void {
    switch (event.type) {
      case 'speech-started':
        this.handleSpeechStarted();
        break;
      case 'speech-continuing':
        break;
      case 'utterance-ready':
      case 'timeout':
        this.handleUtterance(event.utterance);
        break;
    }
  }

  private handleSpeechStarted(): void {
    if (this.currentState === CallState.IDLE) {
      this.transition(CallState.LISTENING);
      return;
    }
    if (this.currentState === CallState.SPEAKING && this.config.bargeInEnabled) {
      this.bargeIn();
    }
  }

  private handleUtterance(utterance: Utterance): void {
    this.stats.utterancesDetected++;

    if (utterance.durationMs < this.config.minUtteranceMs) {
      this.stats.utterancesDiscarded++;
      this.log.debug('Short utterance discarded', {
        durationMs: utterance.durationMs,
        minUtteranceMs: this.config.minUtteranceMs,
      });
      if (!this.turn && this.currentState === CallState.LISTENING && !this.segmentBuffer.isInSpeech) {
        this.transition(CallState.IDLE);
      }
      return;
    }

    this.log.debug('Utterance ready', {
      utteranceId: utterance.id,
      durationMs: utterance.durationMs,
      closedBy: utterance.closedBy,
    });

    if (this.turn) {
      this.enqueuePending(utterance);
      return;
    }
    this.startTurn(utterance);
  }

  private enqueuePending(utterance: Utterance): void {
    this.pending.push(utterance);
    if (this.pending.length > this.config.maxPendingUtterances) {
      const dropped = this.pending.shift();
      this.log.warn('Pending utterance queue full, dropping oldest', {
        droppedUtteranceId: dropped?.id,
        maxPendingUtterances: this.config.maxPendingUtterances,
      });
    }
  }

  private armIdleFlush(): void {
    this.clearIdleFlush();
    if (!this.segmentBuffer.isInSpeech) {
      return;
    }
    this.idleFlushTimer = setTimeout(() => {
      this.idleFlushTimer = null;
      this.onIdleFlush();
    }, this.config.idleFlushMs);
  }

  private clearIdleFlush(): void {
    if (this.idleFlushTimer) {
      clearTimeout(this.idleFlushTimer);
      this.idleFlushTimer = null;
    }
  }

  private onIdleFlush(): void {
    if (this.isEnded) {
      return;
    }
    const event = this.segmentBuffer.flush();
    if (event) {
      this.log.debug('No frames while speech open, utterance flushed');
      this.handleSegmentEvent(event);
    }
  }

  // ---------------------------------------------------------------------------
  // Turn lifecycle
  // ---------------------------------------------------------------------------

  private startTurn(utterance: Utterance): void {
    const generationId = ++this.generation;
    const controller = new AbortController();
    const turn: ActiveTurn = {
      generationId,
      utteranceId: utterance.id,
      controller,
      token: { callId: this.id, generationId, signal: controller.signal },
      chunker: new SpeechFragmentChunker(),
      synthesisChain: Promise.resolve(),
      responseComplete: false,
      synthesisDone: false,
      failed: false,
      chunkIndex: 0,
      deadline: null,
    };

    this.turn = turn;
    this.stats.turnsStarted++;
    this.transition(CallState.TRANSCRIBING);

    turn.deadline = setTimeout(() => {
      turn.deadline = null;
      this.onTurnDeadline(generationId);
    }, this.config.turnDeadlineMs);

    void this.runTranscription(utterance, turn);
  }

  private async runTranscription(utterance: Utterance, turn: ActiveTurn): Promise<void> {
    try {
      const text = await this.deps.transcriber.transcribe(utterance, turn.token);
      this.onTranscriptReady(text, turn.generationId);
    } catch (error) {
      this.onStageFailed('transcription', error, turn.generationId);
    }
  }

  private async runGeneration(turn: ActiveTurn): Promise<void> {
    try {
      // Adapters get a snapshot; later turns never leak into a running request
      const reply = await this.deps.responder.generate([...this.turns], turn.token);

      if (typeof reply === 'string') {
        if (this.onResponseFragment(reply, turn.generationId)) {
          this.onResponseComplete(reply, turn.generationId);
        }
        return;
      }

      let full = '';
      for await (const piece of reply) {
        if (!this.onResponseFragment(piece, turn.generationId)) {
          // Turn moved on; stop pulling from the generator
          return;
        }
        full += piece;
      }
      this.onResponseComplete(full, turn.generationId);
    } catch (error) {
      this.onStageFailed('generation', error, turn.generationId);
    }
  }

  private queueSynthesis(turn: ActiveTurn, text: string): void {
    if (this.currentState === CallState.GENERATING) {
      this.transition(CallState.SYNTHESIZING);
    }
    turn.synthesisChain = turn.synthesisChain.then(() => this.runSynthesis(turn, text));
  }

  private async runSynthesis(turn: ActiveTurn, text: string): Promise<void> {
    if (turn.failed || this.turn !== turn) {
      return;
    }

    try {
      const audio = await this.deps.synthesizer.synthesize(text, turn.token);

      if (Buffer.isBuffer(audio)) {
        this.onAudioChunkReady(audio, turn.generationId);
        return;
      }

      for await (const chunk of audio) {
        if (!this.onAudioChunkReady(chunk, turn.generationId)) {
          // Interrupted; unread chunks are never delivered
          return;
        }
      }
    } catch (error) {
      this.onStageFailed('synthesis', error, turn.generationId);
    }
  }

  private onSynthesisFinished(generationId: number): void {
    const turn = this.currentTurn(generationId, AUDIO_STATES);
    if (!turn || turn.synthesisDone) {
      return;
    }

    turn.synthesisDone = true;
    // Only the carrier is left; playback of any length stays interruptible
    this.clearDeadline(turn);

    if (this.currentState === CallState.SYNTHESIZING) {
      // Nothing was queued; there is no playback to wait for
      this.log.debug('Turn produced no audio', { generationId });
      this.stats.turnsCompleted++;
      this.finishTurn(this.segmentBuffer.isInSpeech ? CallState.LISTENING : CallState.IDLE, false);
      return;
    }

    this.outbound.push({ type: 'end-of-turn', generationId });
  }

  private onStageFailed(stage: TurnStage, error: unknown, generationId: number): void {
    const turn = this.turn;
    if (!turn || turn.generationId !== generationId) {
      if (!isTurnCancelled(error)) {
        this.dropStale(`${stage} failure`, generationId);
      }
      return;
    }
    if (turn.failed) {
      return;
    }
    this.failTurn(turn, stage, error);
  }

  /**
   * Drop the turn. Audio already queued keeps playing and the turn then
   * ends through the normal drain; otherwise the session listens again.
   */
  private failTurn(turn: ActiveTurn, stage: TurnStage, error: unknown): void {
    this.stats.turnsFailed++;
    this.log.error(`Turn ${stage} failed`, {
      generationId: turn.generationId,
      utteranceId: turn.utteranceId,
      state: this.currentState,
      error,
    });

    if (this.currentState === CallState.SPEAKING) {
      turn.failed = true;
      turn.controller.abort();
      if (!turn.synthesisDone) {
        turn.synthesisDone = true;
        this.clearDeadline(turn);
        this.outbound.push({ type: 'end-of-turn', generationId: turn.generationId });
      }
      return;
    }

    this.finishTurn(CallState.LISTENING, true);
  }

  private onTurnDeadline(generationId: number): void {
    const turn = this.turn;
    if (!turn || turn.generationId !== generationId) {
      return;
    }

    this.log.warn('Turn deadline exceeded', {
      generationId,
      state: this.currentState,
      turnDeadlineMs: this.config.turnDeadlineMs,
    });

    this.failTurn(turn, this.stageOf(this.currentState), new Error('Turn deadline exceeded'));
  }

  private bargeIn(): void {
    const turn = this.turn;
    if (!turn) {
      return;
    }

    this.stats.bargeIns++;
    const droppedChunks = this.outbound.clear();
    this.outbound.push({ type: 'clear', generationId: turn.generationId });

    this.log.info('Barge-in, interrupting reply', {
      generationId: turn.generationId,
      droppedChunks,
    });

    this.finishTurn(CallState.LISTENING, true);
  }

  private finishTurn(next: CallState, abort: boolean): void {
    const turn = this.turn;
    if (!turn) {
      return;
    }
    this.releaseTurn(turn, abort);
    this.generation++;
    this.transition(next);
    this.pump();
  }

  private clearDeadline(turn: ActiveTurn): void {
    if (turn.deadline) {
      clearTimeout(turn.deadline);
      turn.deadline = null;
    }
  }

  private releaseTurn(turn: ActiveTurn, abort: boolean): void {
    this.clearDeadline(turn);
    if (abort) {
      turn.controller.abort();
    }
    turn.chunker.reset();
    this.turn = null;
  }

  /**
   * Start the next queued utterance once no turn is in flight
   */
  private pump(): void {
    if (this.turn || this.isEnded) {
      return;
    }
    const next = this.pending.shift();
    if (next) {
      this.startTurn(next);
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private currentTurn(generationId: number, states: CallState[]): ActiveTurn | null {
    const turn = this.turn;
    if (!turn || turn.generationId !== generationId || !states.includes(this.currentState)) {
      return null;
    }
    return turn;
  }

  private dropStale(kind: string, generationId: number): false {
    this.stats.staleResultsDropped++;
    this.log.debug('Stale result dropped', {
      kind,
      generationId,
      currentGeneration: this.generation,
      state: this.currentState,
    });
    return false;
  }

  private appendTurn(speaker: Speaker, text: string): void {
    this.turns.push(Object.freeze({ speaker, text, timestamp: Date.now() }));
  }

  private stageOf(state: CallState): TurnStage {
    if (state === CallState.TRANSCRIBING) {
      return 'transcription';
    }
    if (state === CallState.GENERATING) {
      return 'generation';
    }
    return 'synthesis';
  }

  private transition(next: CallState): boolean {
    const from = this.currentState;
    if (from === next) {
      return true;
    }

    const allowed = validTransitions[from];
    if (!allowed.includes(next)) {
      this.log.warn('Invalid call state transition', { from, to: next });
      return false;
    }

    this.log.debug('Call state transition', { from, to: next });
    this.currentState = next;
    return true;
  }
}
