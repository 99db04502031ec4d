export const LAST_API_POLL_TIME = 'last_api_poll_time';

export interface PollMetadataPort {
  /** Unix seconds of the last upstream poll attempt, or null if none was recorded. */
  getLastPollTime(): Promise<number | null>;
  setLastPollTime(unixSeconds: number): Promise<void>;
}
