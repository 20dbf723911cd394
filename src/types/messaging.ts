/** Boundary to the chat transport. The Telegram implementation lives in src/bot. */

export interface CallToAction {
  text: string;
  url: string;
}

export interface MessagingEndpoint {
  /** Post an image with an HTML caption; resolves to the remote message id */
  sendImageMessage(destination: string, image: string, caption: string, button?: CallToAction): Promise<number>;
  deleteMessage(destination: string, messageId: number): Promise<void>;
  getMemberCount(destination: string): Promise<number>;
}

/** One inbound message from an operator */
export interface InboundMessage {
  userId: number;
  text?: string;
  /** Transport handle of an attached image */
  imageId?: string;
}

export type Reply =
  | { kind: 'text'; text: string; html?: boolean }
  | { kind: 'image'; image: string; caption: string; button?: CallToAction };
