export type InputRow = Readonly<{
  /** Italian example sentence to translate. */
  source_sentence: string;
  /** Italian term the constraint applies to. */
  term: string;
  /** Allowed German renderings of the term. */
  options: readonly string[];
}>;
