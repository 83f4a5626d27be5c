export { RealtimeHub } from './RealtimeHub';
export type { MessageCallback, RealtimeHubOptions, RealtimeSubscribers, StatusCallback } from './RealtimeHub';
export { ChannelConnection, NORMAL_CLOSE_CODE, NORMAL_CLOSE_REASON } from './ChannelConnection';
export { DEFAULT_REALTIME_TUNING, deriveWebSocketBase, loadRealtimeConfig } from './config';
export type { RealtimeConfig, RealtimeTuning } from './config';
export { consoleRealtimeLog } from './log';
export type { RealtimeLog, RealtimeLogLevel } from './log';
export { probeAvailability } from './availability';
export type { AvailabilityProbe, FetchLike } from './availability';
export * from './types';
export { isNotification, isPriceUpdate, isTradingUpdate } from './messages';
