export interface TransformInput {
  image: Buffer;
  mimeType: string;
  prompt: string;
  timeoutMs: number;
}

export interface TransformResult {
  image: Buffer;
  mimeType: string;
  /** Any text the model sent alongside the image */
  text?: string;
}

export interface ImageTransformer {
  /** One request per call. Failures are PerItemError subclasses. */
  transform(input: TransformInput): Promise<TransformResult>;
}
