export { type IntegerLike, Rational, absBigInt, gcd, toBigInt } from "./rational.js";
