// Barrel exports for turn modelling, placement and validation

export * from './turn';
export * from './placement';
export * from './overlap-sweep';
export * from './timeline-validation';
export { ConversationTimeline, TimelineBuildError, buildConversationTimeline } from './conversation-timeline';
export type { TimelineBuildErrorCode } from './conversation-timeline';
export { loadConversationTimeline } from './load-conversation';
