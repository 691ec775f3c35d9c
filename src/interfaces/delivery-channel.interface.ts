/**
 * A progress message that can be rewritten or removed once sent
 */
export interface StatusMessage {
  edit(text: string): Promise<void>;
  delete(): Promise<void>;
}

/**
 * Where the pipeline talks back to the user. Implemented on top of the chat
 * platform; the pipeline only owns the text and the file lifetime.
 */
export interface DeliveryChannel {
  sendMessage(text: string): Promise<void>;
  sendStatus(text: string): Promise<StatusMessage>;
  sendVideo(filePath: string, caption: string): Promise<void>;
}
