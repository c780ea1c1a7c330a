export { findBalancedBlock, innerText, siblingBlocks } from "./matcher";
export { BRACES, PARENS, type DelimiterPair, type Span } from "./types";
