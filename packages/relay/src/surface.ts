// Chat Surface - Capability interface over the logged-in desktop chat session

import type { PayloadKind } from './types.js';

/** One message as currently visible in a contact's conversation. */
export interface SurfaceMessage {
  /** Identifier stable across reads, or a digest the surface derives. */
  id: string;
  /** Milliseconds since epoch. */
  timestamp: number;
  kind: PayloadKind;
  text?: string;
  path?: string;
  fileName?: string;
  /** Sent by the logged-in user rather than the contact. */
  fromSelf?: boolean;
  /** Client notices such as "withdrew a message" or history separators. */
  system?: boolean;
}

export interface ChatSurface {
  readonly name: string;
  /** Attaches to the running chat session. Throws when the window or session is missing. */
  attach(): Promise<void>;
  detach(): Promise<void>;
  /** Messages currently visible for a contact, oldest first. */
  readMessages(nickname: string): Promise<SurfaceMessage[]>;
  sendText(nickname: string, text: string): Promise<void>;
  /** Sends an image or file that already exists on local disk. */
  sendFile(nickname: string, path: string): Promise<void>;
}
