export { ExpectimaxDepthStrategy } from './expectimax-depth';
export { ExpectimaxProbabilityStrategy } from './expectimax-probability';
export type { ExpectimaxProbabilityOptions } from './expectimax-probability';
export { MonteCarloPlayer } from './monte-carlo';
export type { MonteCarloOptions } from './monte-carlo';
export { RandomTrialsStrategy } from './random-trials';
export type { RandomTrialsOptions } from './random-trials';
export { RandomPlayer } from './random-player';
export type { SearchResult, Strategy, StrategyKind, StrategyOptions } from './types';
