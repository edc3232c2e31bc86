export { findComponents, largestComponentAfter } from './components.js';
export type { Component } from './components.js';
export { decideResult, scoreBoard } from './scoring.js';
export type { GameWinner, PlayerScore, ScoreResult } from './scoring.js';
