declare module 'stopwords-iso' {
  /** Stopword lists keyed by ISO 639-1 language code. */
  const stopwords: Record<string, string[]>;
  export default stopwords;
}
