export interface SeedResult {
  created: number;
  updated: number;
  skipped: number;
  details?: string[];
}
