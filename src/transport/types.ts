/** Duplex binary channel carrying one frame per message. */
export interface Transport {
  send(frame: Buffer): Promise<void>;
  /** Next inbound frame in arrival order, or `null` once the channel has closed. */
  receive(): Promise<Buffer | null>;
  close(): Promise<void>;
}
