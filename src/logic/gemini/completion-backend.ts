export interface CompletionOptions {
    stopSequences?: string[];
    temperature?: number;
    maxOutputTokens?: number;
}

export interface Completion {
    text: string;
    model: string;
}

/**
 * Injection token for whatever turns a prompt blob into a completion.
 * Implementations surface backend failures to the caller as they are.
 */
export abstract class CompletionBackend {
    abstract complete(prompt: string, options?: CompletionOptions): Promise<Completion>;
}
