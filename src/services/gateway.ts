export type InlineButton = { label: string; action: string };

export type ButtonRows = InlineButton[][];

export type SendOptions = { buttons?: ButtonRows };

/** Outbound side of the chat transport. */
export interface MessagingGateway {
  send(chatId: number, text: string, options?: SendOptions): Promise<void>;
}
