export { CallSession, isIntelligible } from './call-session.service';
export { OutboundAudioQueue } from './outbound-queue.service';
export { SessionRegistry, sessionRegistry } from './session-registry.service';
export type { CallSessionFactory } from './session-registry.service';
