// ============================================================================
// @nucleocode/core — Error Types
// ============================================================================

/**
 * Base error class for all nucleocode errors.
 */
export class NucleocodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NucleocodeError';
  }
}

// ---------------------------------------------------------------------------
// Construction Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the code alphabet has fewer than two distinct symbols.
 */
export class DegenerateAlphabetError extends NucleocodeError {
  public readonly alphabet: string;

  constructor(alphabet: string, reason: string) {
    super(`Alphabet "${alphabet}" cannot generate prefix-free codes: ${reason}`);
    this.name = 'DegenerateAlphabetError';
    this.alphabet = alphabet;
  }
}

/**
 * Thrown when a root code set cannot seed enough distinct prefix-free codes.
 */
export class AmbiguousRootSetError extends NucleocodeError {
  public readonly rootCodes: readonly string[];

  constructor(rootCodes: readonly string[], reason: string) {
    super(`Root code set [${rootCodes.join(', ')}] is unusable: ${reason}`);
    this.name = 'AmbiguousRootSetError';
    this.rootCodes = rootCodes;
  }
}

/**
 * Thrown when a serialized dictionary is malformed or not prefix-free.
 */
export class DictionaryFormatError extends NucleocodeError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Invalid translation dictionary: ${reason}`);
    this.name = 'DictionaryFormatError';
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Encoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the text contains a symbol the dictionary has no code for.
 */
export class UnmappedSymbolError extends NucleocodeError {
  public readonly symbol: string;
  public readonly index: number;

  constructor(symbol: string, index: number) {
    super(`Symbol ${JSON.stringify(symbol)} at index ${index} has no dictionary entry.`);
    this.name = 'UnmappedSymbolError';
    this.symbol = symbol;
    this.index = index;
  }
}

/**
 * Thrown when decoding hits code characters that resolve to no symbol.
 */
export class IncompleteCodeError extends NucleocodeError {
  public readonly residual: string;
  public readonly offset: number;

  constructor(residual: string, offset: number) {
    super(
      `Code ${JSON.stringify(residual)} starting at offset ${offset} does not resolve to a symbol.`,
    );
    this.name = 'IncompleteCodeError';
    this.residual = residual;
    this.offset = offset;
  }
}
