export interface Prompter {
  // Resolves with null once input has ended (Ctrl-D, Ctrl-C, closed pipe)
  ask(question: string): Promise<string | null>;
  close(): void;
}
