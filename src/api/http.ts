import axios from 'axios';

/**
 * Short reason for a failed request, suitable for a log line
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
