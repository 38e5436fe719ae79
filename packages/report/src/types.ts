export type AnomalyIssue =
  | "State removed"
  | "State added"
  | "New column added"
  | "Column removed"
  | "New metric"
  | "Lost metric"
  | "Cumulative decrease"
  // `>2x increase` with the default multiplier
  | `>${string}x increase`;

export type AnomalyRecord = {
  // state identifier, or "All" for dataset-wide issues
  state: string;
  issue: AnomalyIssue;
  metric: string;
  details: string;
};

export const ALL_STATES = "All";
