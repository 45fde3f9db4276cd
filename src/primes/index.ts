export { isPrime, primesBelow } from "./is-prime.js";
