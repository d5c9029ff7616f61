export interface ProcessedImage {
  sourcePath: string;
  outputPath: string;
}

export interface ImageSelection {
  images: string[];
  /** The scanned folder; absent for explicitly chosen files */
  root?: string;
  alreadyProcessed: ProcessedImage[];
  skippedDirectories: number;
  skippedFiles: number;
}

export interface ConfigStatus {
  configured: boolean;
  model?: string;
  error?: string;
}
