/**
 * Abstract base class for upload parsers
 * All parsers must implement the parse method
 */
export abstract class BaseParser<TResult> {
  /**
   * File extensions this parser can handle
   */
  abstract readonly supportedExtensions: string[];

  /**
   * Parse an uploaded file
   * @param buffer - The file content
   * @param filename - Original filename, used for logging only
   */
  abstract parse(buffer: Buffer, filename?: string): TResult;

  /**
   * Check if this parser can handle the given file extension
   */
  canParseExtension(filename: string): boolean {
    const ext = filename.toLowerCase().split('.').pop() || '';
    return this.supportedExtensions.includes(ext);
  }
}
