import ModernError from "modern-errors";
import modernErrorsSerialize from "modern-errors-serialize";

export const BaseError = ModernError.subclass("BaseError", {
  plugins: [modernErrorsSerialize],
  serialize: {
    exclude: ["stack"],
  },
});

export const EnvValidationError = BaseError.subclass("EnvValidationError");

/** Non-retryable catalog API failure (retries already exhausted by the client) */
export const ScryfallApiError = BaseError.subclass("ScryfallApiError");

/** The catalog has no card for the query */
export const CardNotFoundError = BaseError.subclass("CardNotFoundError");

/** A fuzzy name matched several cards and the catalog picked none */
export const AmbiguousCardError = BaseError.subclass("AmbiguousCardError");

/** The catalog answered with data we cannot use (failed validation, missing faces or parts) */
export const CatalogDataError = BaseError.subclass("CatalogDataError");

export const InvalidCardUrlError = BaseError.subclass("InvalidCardUrlError");

export const MalformedLineError = BaseError.subclass("MalformedLineError");

/** Image bytes or raster buffer could not be decoded */
export const DecodeError = BaseError.subclass("DecodeError");

/** stdin ended while the menu was waiting for an answer */
export const InputClosedError = BaseError.subclass("InputClosedError");

/** Lookup failures that abort a single card but not a whole decklist */
export function isCardFailure(error: unknown): boolean {
  return (
    error instanceof CardNotFoundError ||
    error instanceof AmbiguousCardError ||
    error instanceof CatalogDataError ||
    error instanceof ScryfallApiError
  );
}

/** Plain-object form of any thrown value, for structured log attributes */
export function serializeError(error: unknown) {
  return BaseError.normalize(error).toJSON();
}
