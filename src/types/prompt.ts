export interface Prompt {
  name: string;
  text: string;
  label?: string;
  description?: string;
}

export interface PromptSettings {
  optimize: boolean;
  maxLength: number;
}

export interface PromptFile {
  prompts: Prompt[];
  settings?: Partial<PromptSettings>;
}
