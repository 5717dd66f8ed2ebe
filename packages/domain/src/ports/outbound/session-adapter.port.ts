import type { SessionMessage } from '../../entities/protocol-unit.js';

export interface SessionAdapterStatistics {
  sessionId: string | null;
  sessionActive: boolean;
  messageCount: number;
  errorResponses: number;
}

export interface SessionAdapterPort {
  handle(message: SessionMessage): Promise<SessionMessage>;
  statistics(): SessionAdapterStatistics;
}
