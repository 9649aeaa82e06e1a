/**
 * Call Session Configuration
 */

import { segmentConfig } from '@/modules/audio';
import type { CallSessionConfig } from '../types';

export const callConfig: CallSessionConfig = {
  segment: segmentConfig,
  minUtteranceMs: parseInt(process.env.MIN_UTTERANCE_MS || '300', 10),
  idleFlushMs: parseInt(process.env.UTTERANCE_IDLE_FLUSH_MS || '1000', 10),
  turnDeadlineMs: parseInt(process.env.TURN_DEADLINE_MS || '30000', 10), // 30s
  streamingSynthesis: process.env.STREAMING_SYNTHESIS !== 'false',
  bargeInEnabled: process.env.BARGE_IN_ENABLED !== 'false',
  maxPendingUtterances: parseInt(process.env.MAX_PENDING_UTTERANCES || '10', 10),
};
