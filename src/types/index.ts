export const APPLICATION_STATUSES = ["Applied", "Interview", "Rejected"] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export interface RawMessage {
  id: string;
  threadId: string;
  sender: string;
  subject: string;
  body: string; // plain text or stripped HTML
  receivedAt: Date;
}

export interface ExtractedFields {
  role: string;
  organization: string;
  status: ApplicationStatus;
  applicationDate: string; // YYYY-MM-DD
  jobDescriptionLink?: string;
  notes?: string;
}

export interface ApplicationRecord extends Omit<ExtractedFields, "status"> {
  id: string;
  number: number;
  status: ApplicationStatus | null; // null when the stored value is blank or unknown
}

export type RecordPatch = Partial<
  Pick<
    ExtractedFields,
    "status" | "applicationDate" | "jobDescriptionLink" | "notes"
  >
>;

export type DetailField = "jobDescriptionLink" | "notes";

export type ReconcileAction =
  | { type: "created"; id: string; number: number }
  | {
      type: "updated";
      id: string;
      number: number;
      previousStatus: ApplicationStatus | null;
      status: ApplicationStatus;
    }
  | {
      type: "skipped";
      id: string;
      number: number;
      reason: string;
      refreshed: DetailField[];
    };

export interface NotJobRelated {
  kind: "not-job-related";
  confidence: number;
}

export interface Classification {
  isJobRelated: boolean;
  confidence: number; // 0..1
}

// What the language backend hands back before normalization
export interface RawExtraction {
  role?: string | null;
  organization?: string | null;
  status?: string | null;
  date?: string | null;
  jobDescriptionLink?: string | null;
  notes?: string | null;
}

export interface UnreadableMessage {
  id: string;
  error: unknown;
}

export interface FetchedMessages {
  messages: RawMessage[];
  // Listed but could not be fetched; they stay unread
  unreadable: UnreadableMessage[];
}

export interface MailTransport {
  fetchUnreadMessages(limit: number): Promise<FetchedMessages>;
  markRead(messageId: string): Promise<void>;
}

export interface LanguageService {
  classify(text: string): Promise<Classification>;
  extract(text: string): Promise<RawExtraction>;
}

export interface ApplicationStore {
  find(role: string, organization: string): Promise<ApplicationRecord | null>;
  create(fields: ExtractedFields): Promise<ApplicationRecord>;
  update(recordId: string, patch: RecordPatch): Promise<void>;
}

export type MessageOutcome =
  | { kind: "not-job-related" }
  | { kind: "incomplete"; reason: string }
  | { kind: "reconciled"; action: ReconcileAction }
  | { kind: "failed"; error: unknown };

export interface RunSummary {
  processed: number;
  created: number;
  updated: number;
  skipped: number;
  failed: number;
}
