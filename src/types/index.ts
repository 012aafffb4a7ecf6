export type ChatId = number;
export type UserId = number;

export type Sender = {
    id?: UserId;
    username?: string;
    firstName?: string;
    isBot?: boolean;
    /** Title of the chat a channel post or anonymous admin message was sent as. */
    senderChatTitle?: string;
};

export type ChatType = 'private' | 'group' | 'supergroup' | 'channel';

/** Where an outbound message goes: a chat and, in forum supergroups, a topic. */
export type MessageTarget = {
    chatId: ChatId;
    threadId?: number;
};

/** A run of outbound text; `hidden` runs render as spoilers. */
export type TextSegment = {
    text: string;
    hidden: boolean;
};

export type InboundMessage = MessageTarget & {
    messageId: number;
    chatType: ChatType;
    text?: string;
    sender: Sender;
};

export type CommandInvocation = InboundMessage & {
    command: string;
    args: string[];
};

export type MemberStatus = 'creator' | 'administrator' | 'member' | 'restricted' | 'left' | 'kicked';

/** The bot's own membership status changed in a chat. */
export type MembershipChange = {
    chatId: ChatId;
    chatTitle?: string;
    userId: UserId;
    oldStatus: MemberStatus;
    newStatus: MemberStatus;
};

export type InboundEvent =
    | { kind: 'command'; invocation: CommandInvocation }
    | { kind: 'text'; message: InboundMessage }
    | { kind: 'membership'; change: MembershipChange };

export type AdminDescriptor = {
    id: UserId;
    displayName: string;
};

/** Read-only copy of the whole configuration. */
export type ConfigSnapshot = {
    keywords: Map<ChatId, Set<string>>;
    caseSensitive: boolean;
    admins: Set<UserId>;
    enabledChats: Set<ChatId>;
};
