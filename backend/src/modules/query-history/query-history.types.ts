/**
 * backend/src/modules/query-history/query-history.types.ts
 *
 * WHY:
 * - Domain types for cadastral lookups and their persisted history.
 *
 * RULES:
 * - A history record is immutable once stored.
 * - Coordinates are plain numbers (or null when the client omitted them).
 */

export type QueryHistoryRecord = {
  id: number;
  cadastralNumber: string;
  latitude: number | null;
  longitude: number | null;
  result: boolean;
  createdAt: Date;
};

export type NewQueryHistoryRecord = {
  userId: number;
  cadastralNumber: string;
  latitude: number | null;
  longitude: number | null;
  result: boolean;
};

export type SubmitQueryParams = {
  userId: number;
  cadastralNumber: string;
  latitude: number | null;
  longitude: number | null;
  /** Caller's Authorization header, forwarded to the resolver. */
  authorization: string | null;
  requestId: string;
};

export type ListHistoryParams = {
  userId: number;
  cadastralNumber?: string;
  page: number;
  size: number;
  requestId: string;
};
