export interface TableStats {
  count: number;
  earliest: number | null;
  latest: number | null;
}
