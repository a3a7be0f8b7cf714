/** Resolved identity and storage locations for one conversation. */
export interface ContactRecord {
  displayName: string;
  /** Canonical international form, `+` or `00` followed by digits. */
  number: string;
  historyPath: string;
  attachmentDir: string;
}

export type Direction = 'outbound' | 'inbound';

export const DIRECTION_MARKERS: Readonly<Record<Direction, string>> = {
  outbound: '>',
  inbound: '<',
};

/** One line of a conversation log. */
export interface HistoryEntry {
  timestamp: Date;
  direction: Direction;
  body: string;
}
