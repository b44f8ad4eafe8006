export * from './game/index.js';
