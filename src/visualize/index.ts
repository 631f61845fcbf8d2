export { Colorizer, ColorizerResult, COLORS, classify } from './colorizer.js';
export type { Classification, DisplayColor, Segment } from './colorizer.js';
