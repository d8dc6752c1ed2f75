/** Narrow view of a language-model client: one system-prompted completion. */
export type ChatProvider = {
  chatWithSystem(
    systemPrompt: string | null,
    message: string,
    model: string,
    temperature: number
  ): Promise<string>;
};
