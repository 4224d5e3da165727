/** Flag parsers shared by the commands; stricli reports what they throw. */

export function parsePositiveNumber(input: string): number {
	const value = Number(input);
	if (!Number.isFinite(value) || value <= 0) {
		throw new SyntaxError(`Expected a positive number, got '${input}'`);
	}
	return value;
}

export function parseCount(input: string): number {
	const value = Number(input);
	if (!Number.isInteger(value) || value < 0) {
		throw new SyntaxError(`Expected a non-negative integer, got '${input}'`);
	}
	return value;
}
