export { BaseRepository } from './base-repository';
export { PostgresEventStore, type EventStore } from './event-store';
