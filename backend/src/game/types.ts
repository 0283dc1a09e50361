export type GridPosition = {
  x: number;
  y: number;
};

export type RoundState = {
  level: number;
  score: number;
  collected: number;
  required: number;
  playerPosition: GridPosition;
  adversaryPosition: GridPosition;
  items: GridPosition[];
  roundStartedAtMs: number;
  readonly ownerId: string;
  readonly ownerLabel: string;
};

export type RoundStep =
  | { kind: 'moved'; collectedItem: GridPosition | null }
  | { kind: 'level_up'; level: number }
  | { kind: 'time_up'; finalScore: number }
  | { kind: 'caught'; finalScore: number };

export type TerminalStep = Extract<RoundStep, { kind: 'time_up' | 'caught' }>;

export function isTerminalStep(step: RoundStep): step is TerminalStep {
  return step.kind === 'time_up' || step.kind === 'caught';
}
