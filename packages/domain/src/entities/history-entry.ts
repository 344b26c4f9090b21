export interface HistoryEntry {
  readonly timestamp: Date;
  readonly value: number;
}
