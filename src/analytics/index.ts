export { CrossDirection, calcSMA, detectCross, smaSeries } from "./indicators.js";
