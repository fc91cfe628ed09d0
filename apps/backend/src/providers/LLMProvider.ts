export interface LLMProvider {
  readonly name: "mock" | "gemini";
  /** Dyslexia-friendly rewrite of the whole article. */
  rewrite(text: string): Promise<string>;
  /** Bullet-point summary as the model wrote it; parsed by the pipeline. */
  summarize(text: string): Promise<string>;
  title(text: string): Promise<string>;
}
