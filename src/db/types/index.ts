export * from './enums.js';
export * from './wind.js';
export * from './event-carry.js';
export * from './journey-state.js';
export * from './daily-weather.js';
