export { LogEventSink, HttpEventSink, FanoutEventSink, createEventSink } from './event-sink';
export { CircleEvents } from './types';
export type {
    DomainEvent,
    EventSink,
    HttpEventSinkConfig,
    MemberAddedEvent,
    MemberRemovedEvent,
    OwnershipTransferredEvent,
    InviteConsumedEvent,
    CircleDeletedEvent,
} from './types';
