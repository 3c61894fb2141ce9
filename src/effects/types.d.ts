// ============================================================================
// Configuration
// ============================================================================

import {ParticipantId} from '../domain';

export type LedgerConfig = {
    readonly account: ParticipantId;
    readonly administrators: readonly ParticipantId[];
    readonly platformFeeBps: number;
    readonly rewardBps: number;
    readonly feeRecipient: ParticipantId;
    readonly rewardTreasury: ParticipantId;
    readonly distributorAccount: ParticipantId;
}

export type EventStreamConfig = {
    readonly streamName: string;
    readonly region: string;
    readonly accessKeyId: string;
    readonly secretAccessKey: string;
    readonly endpoint?: string;
}

export type ServerConfig = {
    readonly port: number;
}

export type ProductionConfig = {
    readonly ledger: LedgerConfig;
    readonly server: ServerConfig;
    // null: events are logged to the console
    readonly eventStream: EventStreamConfig | null;
}
