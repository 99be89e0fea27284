/**
 * Report Module - Errors
 *
 * Aggregation itself never fails: an empty selection yields a zero-valued
 * snapshot. Only the file boundaries can.
 */

export type FilterFileError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] };

export interface PayloadWriteError {
  type: 'WriteError';
  message: string;
}
