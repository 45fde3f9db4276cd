/**
 * Deterministic primality test by 6k ± 1 trial division.
 *
 * Primes used as a p-adic base are small in practice, so trial division up to
 * √n is enough; non-integers and values below 2 are not prime.
 */
export function isPrime(n: number | bigint): boolean {
	let value: bigint;
	if (typeof n === "bigint") {
		value = n;
	} else {
		if (!Number.isSafeInteger(n)) return false;
		value = BigInt(n);
	}
	if (value < 2n) return false;
	if (value < 4n) return true;
	if (value % 2n === 0n || value % 3n === 0n) return false;
	for (let k = 5n; k * k <= value; k += 6n) {
		if (value % k === 0n || value % (k + 2n) === 0n) return false;
	}
	return true;
}

/** The primes below `limit`, in increasing order. */
export function primesBelow(limit: number): number[] {
	const primes: number[] = [];
	for (let n = 2; n < limit; n++) {
		if (isPrime(n)) primes.push(n);
	}
	return primes;
}
