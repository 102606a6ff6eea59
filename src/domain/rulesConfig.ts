/**
 * Draw-rule configuration.
 *
 * The defaults are the standard rules: a draw at 100 half-moves without a pawn
 * move or capture, on the third occurrence of a position, and when neither
 * side has mating material.
 */
export type RulesConfig = {
  /** Half-moves without pawn move or capture that end the game; 0 disables the rule. */
  fiftyMoveHalfmoves: number;
  /** Occurrences of one position that end the game. */
  repetitionCount: number;
  insufficientMaterial: boolean;
};

export const DEFAULT_RULES: Readonly<RulesConfig> = Object.freeze({
  fiftyMoveHalfmoves: 100,
  repetitionCount: 3,
  insufficientMaterial: true
});

function isNonNegativeInteger(n: unknown): n is number {
  return typeof n === 'number' && Number.isInteger(n) && n >= 0;
}

/**
 * Fills missing fields from `DEFAULT_RULES`. Throws on values that would make
 * the draw rules meaningless; configuration is programmer input.
 */
export function resolveRulesConfig(partial?: Partial<RulesConfig>): RulesConfig {
  const rules: RulesConfig = { ...DEFAULT_RULES, ...partial };

  if (!isNonNegativeInteger(rules.fiftyMoveHalfmoves)) {
    throw new Error(`fiftyMoveHalfmoves must be a non-negative integer, got ${String(rules.fiftyMoveHalfmoves)}`);
  }
  if (!isNonNegativeInteger(rules.repetitionCount) || rules.repetitionCount < 2) {
    throw new Error(`repetitionCount must be an integer >= 2, got ${String(rules.repetitionCount)}`);
  }
  if (typeof rules.insufficientMaterial !== 'boolean') {
    throw new Error('insufficientMaterial must be a boolean');
  }

  return rules;
}
