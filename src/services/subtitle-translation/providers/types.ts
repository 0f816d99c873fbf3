/**
 * Narrow contract every translation backend implements. Implementations throw
 * `ProviderTransientError`, `ProviderPermanentError` or `ProviderRequestError`
 * and must return exactly one string per input text, in input order.
 */
export interface TranslationProvider {
  readonly id: string;
  translate(
    texts: readonly string[],
    sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<string[]>;
}
