/**
 * Options shared by the format parsers
 */
export interface ParseOptions {
  /** Receives diagnostic messages */
  logCallback?: (message: string) => void;
}

export type SupportedFormat = 'docx' | 'xlsx';
