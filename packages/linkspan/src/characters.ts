// All classification is done on a single UTF-16 code unit and only ASCII is ever recognised: anything above 0x7F is not a letter, digit, space or punctuation character, and so passes through the scanner untouched.

export function isAlpha(code: number): boolean {
	return (
		(code >= 0x41 /* A */ && code <= 0x5a) /* Z */ ||
		(code >= 0x61 /* a */ && code <= 0x7a) /* z */
	);
}

export function isDigit(code: number): boolean {
	return code >= 0x30 /* 0 */ && code <= 0x39; /* 9 */
}

export function isAlphanumeric(code: number): boolean {
	return isAlpha(code) || isDigit(code);
}

/**
 * Checks if the code unit is an ASCII whitespace character: space, \t, \n, \v, \f or \r.
 */
export function isSpace(code: number): boolean {
	switch (code) {
		case 0x09: /* \t */
		case 0x0a: /* \n */
		case 0x0b: /* \v */
		case 0x0c: /* \f */
		case 0x0d: /* \r */
		case 0x20:
			return true;
		default:
			return false;
	}
}

/**
 * Checks if the code unit is an ASCII punctuation character.
 * An ASCII punctuation character is !, ", #, $, %, &, ', (, ), *, +, ,, -, ., / (U+0021–2F), :, ;, <, =, >, ?, @ (U+003A–0040), [, \, ], ^, _, ` (U+005B–0060), {, |, }, or ~ (U+007B–007E).
 */
export function isPunctuation(code: number): boolean {
	return (
		(code >= 0x21 && code <= 0x2f) ||
		(code >= 0x3a && code <= 0x40) ||
		(code >= 0x5b && code <= 0x60) ||
		(code >= 0x7b && code <= 0x7e)
	);
}

export function toLowerAscii(code: number): number {
	return code >= 0x41 && code <= 0x5a ? code + 0x20 : code;
}

/**
 * Compares `text` at `index` against an ASCII `prefix`, ignoring the case of ASCII letters.
 */
export function startsWithIgnoringCase(
	text: string,
	index: number,
	prefix: string,
): boolean {
	if (text.length - index < prefix.length) return false;
	for (let i = 0; i < prefix.length; i++) {
		if (
			toLowerAscii(text.charCodeAt(index + i)) !==
			toLowerAscii(prefix.charCodeAt(i))
		) {
			return false;
		}
	}
	return true;
}
