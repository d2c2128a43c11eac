/**
 * Conversation collaborator consumed by providers: builds the prompt sent
 * upstream and records each completed exchange.
 */
export interface ConversationStore {
  genCompletePrompt(prompt: string): string;
  updateChatHistory(prompt: string, response: string): void;
}

export interface ConversationOptions {
  /** When false, prompts pass through untouched and nothing is recorded */
  enabled?: boolean;
  intro?: string;
  /** Upper bound on intro + history characters sent upstream */
  historyOffset?: number;
}

export const DEFAULT_INTRO =
  "You're a Large Language Model for chatting with people. " +
  'Assume role of the LLM and give your response.';

export const DEFAULT_HISTORY_OFFSET = 10250;

// Room kept for the marker that replaces trimmed history
const PROMPT_ALLOWANCE = 10;

/**
 * In-memory transcript. History is a flat text log of
 * `\nUser : <prompt>\nLLM :<response>` entries, trimmed from the front once
 * it outgrows `historyOffset`.
 */
export class Conversation implements ConversationStore {
  readonly enabled: boolean;
  readonly intro: string;
  readonly historyOffset: number;
  private chatHistory = '';
  private turns = 0;

  constructor(options: ConversationOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.intro = options.intro ?? DEFAULT_INTRO;
    this.historyOffset = options.historyOffset ?? DEFAULT_HISTORY_OFFSET;
  }

  get history(): string {
    return this.chatHistory;
  }

  get turnCount(): number {
    return this.turns;
  }

  genCompletePrompt(prompt: string, intro: string = this.intro): string {
    if (!this.enabled) return prompt;
    const pending = this.chatHistory + formatTurn(prompt, '');
    return intro + this.trim(pending, intro);
  }

  updateChatHistory(prompt: string, response: string): void {
    if (!this.enabled) return;
    this.chatHistory += formatTurn(prompt, response);
    this.turns++;
  }

  reset(): void {
    this.chatHistory = '';
    this.turns = 0;
  }

  private trim(history: string, intro: string): string {
    const total = intro.length + history.length;
    if (total <= this.historyOffset) return history;

    const truncateAt = total - this.historyOffset + PROMPT_ALLOWANCE;
    return '... ' + history.slice(truncateAt);
  }
}

function formatTurn(user: string, llm: string): string {
  return `\nUser : ${user}\nLLM :${llm}`;
}
