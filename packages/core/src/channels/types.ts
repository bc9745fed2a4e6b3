import type { PipelineEvent } from "../events.js";

export interface Channel {
  id: string;
  /**
   * Published synchronously inside the router's section instead of through the
   * channel's delivery lane. Only for channels whose `publish` never blocks.
   */
  inline?: boolean;
  publish: (event: PipelineEvent) => Promise<void> | void;
  close?: () => Promise<void> | void;
}

export type ChannelOutcome =
  | {
      channelId: string;
      ok: true;
    }
  | {
      channelId: string;
      ok: false;
      error: string;
      timedOut?: boolean;
    };

export interface ChannelDiagnostics {
  channelId: string;
  delivered: number;
  failed: number;
  lastError?: string;
}
