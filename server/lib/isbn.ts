const ISBN_CANDIDATE = /97[89]\d{10}|\d{9}[\dX]/;

function isValidIsbn10(isbn: string): boolean {
  let sum = 0;
  for (let i = 0; i < 10; i++) {
    const char = isbn[i];
    const digit = char === "X" ? 10 : Number(char);
    if (char === "X" && i !== 9) {
      return false;
    }
    sum += digit * (10 - i);
  }
  return sum % 11 === 0;
}

function isbn13CheckDigit(first12: string): number {
  let sum = 0;
  for (let i = 0; i < 12; i++) {
    sum += Number(first12[i]) * (i % 2 === 0 ? 1 : 3);
  }
  return (10 - (sum % 10)) % 10;
}

function isValidIsbn13(isbn: string): boolean {
  return (
    /^97[89]\d{10}$/.test(isbn) &&
    isbn13CheckDigit(isbn.slice(0, 12)) === Number(isbn[12])
  );
}

function normalizeCandidate(candidate: string): string | null {
  if (candidate.length === 13) {
    return isValidIsbn13(candidate) ? candidate : null;
  }

  if (candidate.length === 10 && isValidIsbn10(candidate)) {
    const first12 = `978${candidate.slice(0, 9)}`;
    return `${first12}${isbn13CheckDigit(first12)}`;
  }

  return null;
}

/**
 * Converts an ISBN-10 or ISBN-13 to its 13-digit form.
 *
 * Hyphens and spaces are ignored. In strict mode the whole input must be one
 * ISBN; otherwise the first ISBN-shaped run inside a longer string is used
 * (e.g. "ISBN 0-441-01359-7 (pbk)").
 *
 * @returns the ISBN-13, or null when the input holds no valid ISBN
 */
export function toIsbn13(input: string, strict = false): string | null {
  const cleaned = input.replace(/[\s-]/g, "").toUpperCase();

  if (strict) {
    return /^(\d{13}|\d{9}[\dX])$/.test(cleaned)
      ? normalizeCandidate(cleaned)
      : null;
  }

  const match = ISBN_CANDIDATE.exec(cleaned);
  return match ? normalizeCandidate(match[0]) : null;
}
