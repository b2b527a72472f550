export * from './types';
export * from './engine/Rules';
export * from './engine/Grid';
export * from './engine/Solver';
export * from './engine/Generator';
export * from './engine/DifficultyBounds';
export * from './engine/Random';
export * from './engine/Command';
export * from './engine/GameSession';
export * from './defaults';
export * from './errors';
