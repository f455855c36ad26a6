export interface SessionRow {
  id: number;
  title: string;
  created_at: string;
  updated_at: string | null;
  profession: string | null;
  is_synced: number;
}

export interface MessageRow {
  id: string;
  session_id: number;
  content: string;
  type: string;
  timestamp: string;
  status: string;
  is_synced: number;
  metadata: string | null;
  remote_record_id: string | null;
  turn: string | null;
}

export interface PendingOpRow {
  id: number;
  entity_kind: string;
  operation: string;
  entity_id: string;
  session_id: number | null;
  payload: string;
  enqueued_at: string;
  attempts: number;
  last_error: string | null;
}
