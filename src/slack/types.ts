import type { ChatPostMessageArguments } from '@slack/web-api';

export interface SlackContext {
  userId: string;
  channelId: string;
  messageTs: string;
}

export type SlackAttachment = NonNullable<ChatPostMessageArguments['attachments']>[number];

/** The part of the Slack Web API the bot and transport call. */
export interface SlackChatClient {
  conversations: {
    open(args: { users: string }): Promise<{ ok?: boolean; channel?: { id?: string } }>;
  };
  chat: {
    postMessage(args: ChatPostMessageArguments): Promise<{ ok?: boolean; ts?: string; channel?: string }>;
    delete(args: { channel: string; ts: string }): Promise<{ ok?: boolean }>;
  };
}

export type MessageHandler = (ctx: SlackContext, text: string, client: SlackChatClient) => Promise<void>;

export interface ConnectionHandlers {
  onConnectionLost(): void;
  onConnectionRestored(): void;
}
