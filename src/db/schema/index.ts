export { journeys } from './journeys.js';
export { dailyWeather } from './daily-weather.js';
