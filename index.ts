export { evaluateExpression } from "./engine/evaluator";
export { MAX_DICE, operatorSequences, permutations, subsets } from "./engine/enumerate";
export { evaluateStandard } from "./engine/precedence";
export * from "./engine/types";
export { rollDice, Rng } from "./generator/dice";
export { getPrimeConstants, MAX_LEVEL } from "./generator/levels";
export {
  dispatchPrimes,
  SearchDispatchError,
  type DispatchMode,
  type DispatchOptions,
} from "./solver/dispatcher";
export { estimateSuccessRate, type SuccessRate, type SuccessRateOptions } from "./solver/odds";
export { searchPrime, type SearchOptions, type SearchProgress } from "./solver/search";
