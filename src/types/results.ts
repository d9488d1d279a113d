export interface EventQuery {
  pickId: string;
  sport: string;
  league?: string;
  participants: string[];
  date: string;        // yyyy-MM-dd
  time?: string;
  venue?: string;
}

export interface OutcomeParticipant {
  name: string;
  score: number;
}

export interface Outcome {
  providerEventId: string;
  status: 'final' | 'cancelled';
  participants: OutcomeParticipant[];   // aligned with the query's participants, extras after
  winner?: string | null;   // single-selection result, when the provider names one
  startsAt: string;
}

export type NotAvailableReason = 'scheduled' | 'in_progress' | 'postponed' | 'transport';
export type NoMatchReason = 'not_found' | 'ambiguous' | 'unsupported_sport';

export type LookupResult =
  | { kind: 'outcome'; outcome: Outcome }
  | { kind: 'not_available'; reason: NotAvailableReason; detail?: string }
  | { kind: 'no_match'; reason: NoMatchReason; candidates: string[] };

export interface ResultsSource {
  lookup(query: EventQuery): Promise<LookupResult>;
}
