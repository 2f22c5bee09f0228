export interface SyncReport {
  created: Array<{ ics_uid: string; title: string | null; id: string }>;
  updated: Array<{ ics_uid: string; title: string | null; id: string }>;
  errors: Array<{ file?: string; ics_uid?: string; title?: string | null; error: string }>;
  files: string[];
}

export const emptyReport = (): SyncReport => ({
  created: [],
  updated: [],
  errors: [],
  files: [],
});
