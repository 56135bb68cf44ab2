export interface NotesGenerationOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  prompt: string;
}

export interface NotesResponse {
  text: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface AIProvider {
  name: string;

  validateApiKey(apiKey: string): Promise<boolean>;

  generateNotes(content: string, options: NotesGenerationOptions): Promise<NotesResponse>;
}
