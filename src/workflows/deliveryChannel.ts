import { callCapability } from '../core/integrationPolicy';
import { MessagingAffordance, OutreachAutomation } from '../types/capabilities';

export const CONNECTION_NOTE_LIMIT = 300;

export type DeliveryChannel =
    | { kind: 'direct_message' }
    | { kind: 'connection_request'; noteLimit: number }
    | { kind: 'none' };

export function channelForAffordance(affordance: MessagingAffordance): DeliveryChannel {
    switch (affordance) {
        case 'direct_message':
            return { kind: 'direct_message' };
        case 'connection_request':
            return { kind: 'connection_request', noteLimit: CONNECTION_NOTE_LIMIT };
        case 'none':
            return { kind: 'none' };
    }
}

/** Cuts by code point so a surrogate pair is never split. */
export function truncateNote(text: string, limit: number = CONNECTION_NOTE_LIMIT): string {
    const chars = Array.from(text);
    return chars.length <= limit ? text : chars.slice(0, limit).join('');
}

export interface DispatchOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
    signal?: AbortSignal;
}

/** Returns the text actually delivered, after channel-specific shaping. */
export async function dispatchOnChannel(
    automation: OutreachAutomation,
    channel: Exclude<DeliveryChannel, { kind: 'none' }>,
    profileUrl: string,
    text: string,
    options: DispatchOptions = {}
): Promise<string> {
    if (channel.kind === 'direct_message') {
        await callCapability('sendDirectMessage', () => automation.sendDirectMessage(profileUrl, text), options);
        return text;
    }
    const note = truncateNote(text, channel.noteLimit);
    await callCapability('sendConnectionRequest', () => automation.sendConnectionRequest(profileUrl, note), options);
    return note;
}
