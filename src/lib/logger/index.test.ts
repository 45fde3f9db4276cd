import { describe, expect, it } from "vitest";
import { createLogger, silentLogger, toLoggable } from "./index.js";

function capture(level: "debug" | "info" | "warn" = "info") {
	const lines: string[] = [];
	const logger = createLogger({
		level,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	return { lines, logger };
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("returns a Logger with all standard methods", () => {
			const logger = createLogger({ level: "info" });

			expect(typeof logger.info).toBe("function");
			expect(typeof logger.warn).toBe("function");
			expect(typeof logger.error).toBe("function");
			expect(typeof logger.debug).toBe("function");
			expect(typeof logger.child).toBe("function");
		});

		it("binds the configured name to every record", () => {
			const lines: string[] = [];
			const logger = createLogger({
				level: "info",
				name: "padic",
				destination: {
					write(msg: string) {
						lines.push(msg);
					},
				},
			});

			logger.info("hello");

			expect(JSON.parse(lines[0] ?? "{}").name).toBe("padic");
		});

		it("child logger carries its bindings", () => {
			const { lines, logger } = capture();
			logger.child({ prime: 5 }).info("bound");

			const record = JSON.parse(lines[0] ?? "{}");
			expect(record.prime).toBe(5);
			expect(record.msg).toBe("bound");
		});
	});

	describe("bigint payloads", () => {
		it("serialises bigint fields as decimal strings", () => {
			const { lines, logger } = capture();
			logger.info({ numerator: 12345678901234567890n, digits: [1n, 2] }, "big");

			const record = JSON.parse(lines[0] ?? "{}");
			expect(record.numerator).toBe("12345678901234567890");
			expect(record.digits).toEqual(["1", 2]);
		});

		it("toLoggable leaves other values untouched", () => {
			expect(toLoggable({ a: 1, b: "x", c: 3n })).toEqual({ a: 1, b: "x", c: "3" });
		});
	});

	describe("log levels", () => {
		it("respects configured log level", () => {
			const { lines, logger } = capture("warn");

			logger.debug("should not appear");
			logger.info("should not appear either");
			logger.warn("should appear");

			expect(lines.length).toBe(1);
			expect(lines[0]).toContain("should appear");
		});

		it("emits debug records when enabled", () => {
			const { lines, logger } = capture("debug");
			logger.debug({ valuation: -2 }, "extracted");

			expect(JSON.parse(lines[0] ?? "{}").valuation).toBe(-2);
		});
	});

	describe("silentLogger", () => {
		it("accepts every call and returns itself as child", () => {
			expect(() => silentLogger.info("x")).not.toThrow();
			expect(silentLogger.child({ a: 1 })).toBe(silentLogger);
		});
	});
});
