/**
 * Segment Buffer
 * Accumulates frames for one call and decides where utterances start and end
 *
 * Idle: frames go to a bounded pre-roll ring. A run of `speechDebounceFrames`
 * speech frames opens an utterance seeded with the pre-roll.
 * Listening: `silenceTrailFrames` consecutive silence frames close it. The
 * frame completing the trail is not part of the utterance and seeds the next
 * pre-roll. A frame that would take the utterance past `maxUtteranceMs` closes
 * it first and is then handled as an idle frame.
 */

import { generateId } from '@/shared/utils/uuid';
import { concatSamples } from '../utils/pcm.utils';
import type {
  AudioFrame,
  SegmentBufferConfig,
  SegmentEvent,
  Utterance,
  UtteranceCloseReason,
  VoiceActivityDetector,
} from '../types';

type BufferMode = 'idle' | 'listening';

export class SegmentBuffer {
  private mode: BufferMode = 'idle';
  private preRoll: AudioFrame[] = [];
  private candidate: AudioFrame[] = [];
  private utterance: AudioFrame[] = [];
  private utteranceMs = 0;
  private silenceRun = 0;

  constructor(
    private readonly config: SegmentBufferConfig,
    private readonly vad: VoiceActivityDetector
  ) {
    if (config.speechDebounceFrames < 1 || config.silenceTrailFrames < 1) {
      throw new RangeError('Debounce and trail must be at least one frame');
    }
    if (config.preRollFrames < 0 || config.maxUtteranceMs <= 0) {
      throw new RangeError('Pre-roll must be non-negative and max utterance positive');
    }
  }

  /**
   * True while an utterance is open
   */
  get isInSpeech(): boolean {
    return this.mode === 'listening';
  }

  /**
   * Frames currently held (pre-roll, candidate run and open utterance)
   */
  get bufferedFrameCount(): number {
    return this.preRoll.length + this.candidate.length + this.utterance.length;
  }

  push(frame: AudioFrame): SegmentEvent | null {
    const speech = this.vad.isSpeech(frame);

    if (this.mode === 'idle') {
      return this.pushIdle(frame, speech);
    }

    if (this.utteranceMs + frame.durationMs > this.config.maxUtteranceMs) {
      const utterance = this.closeUtterance('max-duration');
      // The cap frame starts over as an idle frame; a speech-started it
      // produces here is implied by the utterance-ready returned instead
      this.pushIdle(frame, speech);
      return { type: 'utterance-ready', utterance };
    }

    if (speech) {
      this.silenceRun = 0;
      this.appendToUtterance(frame);
      return { type: 'speech-continuing' };
    }

    this.silenceRun++;
    if (this.silenceRun >= this.config.silenceTrailFrames) {
      const utterance = this.closeUtterance('silence');
      this.addToPreRoll(frame);
      return { type: 'utterance-ready', utterance };
    }

    this.appendToUtterance(frame);
    return { type: 'speech-continuing' };
  }

  /**
   * Close the open utterance, if any, because frames stopped arriving
   */
  flush(): SegmentEvent | null {
    if (this.mode !== 'listening') {
      return null;
    }
    return { type: 'timeout', utterance: this.closeUtterance('idle-timeout') };
  }

  /**
   * Drop every buffered frame and return to idle
   */
  reset(): void {
    this.mode = 'idle';
    this.preRoll = [];
    this.candidate = [];
    this.utterance = [];
    this.utteranceMs = 0;
    this.silenceRun = 0;
  }

  private pushIdle(frame: AudioFrame, speech: boolean): SegmentEvent | null {
    if (!speech) {
      // A candidate run broken before debounce is ordinary pre-roll
      for (const pending of this.candidate) {
        this.addToPreRoll(pending);
      }
      this.candidate = [];
      this.addToPreRoll(frame);
      return null;
    }

    this.candidate.push(frame);
    if (this.candidate.length < this.config.speechDebounceFrames) {
      return null;
    }

    this.mode = 'listening';
    this.silenceRun = 0;
    this.utterance = [];
    this.utteranceMs = 0;
    for (const buffered of [...this.preRoll, ...this.candidate]) {
      this.appendToUtterance(buffered);
    }
    this.preRoll = [];
    this.candidate = [];
    return { type: 'speech-started' };
  }

  private appendToUtterance(frame: AudioFrame): void {
    this.utterance.push(frame);
    this.utteranceMs += frame.durationMs;
  }

  private addToPreRoll(frame: AudioFrame): void {
    if (this.config.preRollFrames === 0) {
      return;
    }
    this.preRoll.push(frame);
    if (this.preRoll.length > this.config.preRollFrames) {
      this.preRoll.shift();
    }
  }

  private closeUtterance(closedBy: UtteranceCloseReason): Utterance {
    const frames = this.utterance;
    const utterance: Utterance = {
      id: generateId(),
      frames,
      durationMs: this.utteranceMs,
      sampleRate: frames.length > 0 ? frames[0].sampleRate : 0,
      closedBy,
    };

    this.mode = 'idle';
    this.utterance = [];
    this.utteranceMs = 0;
    this.silenceRun = 0;
    return utterance;
  }
}

/**
 * Concatenate an utterance's samples in frame order
 */
export function utteranceSamples(utterance: Utterance): Int16Array {
  return concatSamples(utterance.frames.map((frame) => frame.samples));
}
