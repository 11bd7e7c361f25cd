/**
 * Shared helpers for price providers
 */

import axios from 'axios';
import { ProviderError, errorMessage } from '../../../common/errors.js';

export function toProviderError(symbol: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;

  if (axios.isAxiosError(err)) {
    const reason = err.response?.status ? `HTTP ${err.response.status}` : err.code ?? err.message;
    return new ProviderError(symbol, reason, { cause: err });
  }

  return new ProviderError(symbol, errorMessage(err), { cause: err });
}

export function isoDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}
