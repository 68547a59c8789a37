export type Operator = "+" | "-" | "*" | "/";

export const OPERATORS: readonly Operator[] = ["+", "-", "*", "/"];

export type EvaluationStatus = "ok" | "division_by_zero" | "empty";

export interface Evaluation {
  status: EvaluationStatus;
  value: number;
  expression: string;
}

export type SearchStatus = "found" | "exhausted" | "budget";

export interface SearchResult {
  prime: number;
  expression: string;
  found: boolean;
  status: SearchStatus;
  evaluations: number;
}

export interface SearchBudget {
  /** Evaluator calls allowed per prime (0 = unlimited). */
  maxEvaluations?: number;
  /** Wall time allowed per prime in milliseconds (0 = unlimited). */
  timeLimitMs?: number;
}

export interface DispatchResult {
  results: SearchResult[];
  success: boolean;
}
