/**
 * Events flowing from a reasoning session to its sink.
 */

export interface ThoughtEvent {
    kind: 'thought';
    text: string;
}

export interface AnswerEvent {
    kind: 'answer';
    text: string;
}

export type QueryEvent = ThoughtEvent | AnswerEvent;

export type DeliveryMode = 'NONE' | 'PULL' | 'PUSH';

export type Delivery =
    | { mode: 'NONE' }
    | { mode: 'PULL' }
    | { mode: 'PUSH'; channelId: string };

export type QueryState =
    | 'FETCHING'
    | 'PROMPTING'
    | 'DISPATCHED'
    | 'STREAMING'
    | 'BLOCKED'
    | 'COMPLETED'
    | 'FAILED';

export interface QueryTransition {
    queryId: string;
    from: QueryState | null;
    to: QueryState;
    at: number;
}
