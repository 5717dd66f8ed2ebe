import type {
  FieldMap,
  SessionAdapterPort,
  SessionAdapterStatistics,
  SessionMessage,
  SessionMessageType,
} from '@evsim/domain';

export interface VehicleSessionOptions {
  evseId?: string;
  maxPowerAcW?: number;
  maxCurrentAcA?: number;
}

/** Simulated charging station side of the vehicle-to-grid session protocol. */
export class VehicleSessionAdapter implements SessionAdapterPort {
  private sessionId: string | null = null;
  private sessionActive = false;
  private sessionCounter = 0;
  private messageCount = 0;
  private errorResponses = 0;

  private readonly evseId: string;
  private readonly maxPowerAcW: number;
  private readonly maxCurrentAcA: number;

  constructor(opts: VehicleSessionOptions = {}) {
    this.evseId = opts.evseId ?? 'EVSE-SIM-001';
    this.maxPowerAcW = opts.maxPowerAcW ?? 22_000;
    this.maxCurrentAcA = opts.maxCurrentAcA ?? 32;
  }

  async handle(message: SessionMessage): Promise<SessionMessage> {
    this.messageCount++;
    const { fields } = message;

    switch (message.messageType) {
      case 'DiscoveryReq':
        return respond('DiscoveryRes', { evseId: this.evseId, securityLevel: 'TLS', port: 15118 });

      case 'ServiceDiscoveryReq':
        return respond('ServiceDiscoveryRes', {
          services: 'AC,DC',
          maxPowerAcW: this.maxPowerAcW,
          maxCurrentAcA: this.maxCurrentAcA,
        });

      case 'SessionStartReq': {
        this.sessionCounter++;
        const sessionId = `SESSION-${String(this.sessionCounter).padStart(4, '0')}`;
        this.sessionId = sessionId;
        this.sessionActive = true;
        return respond('SessionStartRes', { sessionId, evseId: this.evseId, responseCode: 'OK' });
      }

      case 'ChargingStatusReq': {
        const refused = this.checkSession(fields);
        if (refused) return refused;
        const requested = fields['requestedPower'];
        return respond('ChargingStatusRes', {
          sessionId: this.sessionId,
          chargingState: 'Active',
          currentPower: typeof requested === 'number' ? Math.min(requested, this.maxPowerAcW) : 0,
          responseCode: 'OK',
        });
      }

      case 'PowerDeliveryReq': {
        const refused = this.checkSession(fields);
        if (refused) return refused;
        return respond('PowerDeliveryRes', { sessionId: this.sessionId, powerAvailable: true, responseCode: 'OK' });
      }

      case 'SessionStopReq': {
        const refused = this.checkSession(fields);
        if (refused) return refused;
        this.sessionActive = false;
        return respond('SessionStopRes', { sessionId: this.sessionId, responseCode: 'OK' });
      }

      default:
        return this.errorRes(`Unknown message type ${message.messageType}`);
    }
  }

  statistics(): SessionAdapterStatistics {
    return {
      sessionId: this.sessionId,
      sessionActive: this.sessionActive,
      messageCount: this.messageCount,
      errorResponses: this.errorResponses,
    };
  }

  private checkSession(fields: FieldMap): SessionMessage | null {
    if (!this.sessionActive || this.sessionId === null) return this.errorRes('No active session');
    const claimed = fields['sessionId'];
    if (claimed !== this.sessionId) return this.errorRes(`Unknown session ${String(claimed)}`);
    return null;
  }

  private errorRes(error: string): SessionMessage {
    this.errorResponses++;
    return respond('ErrorRes', { error, responseCode: 'FAILED' });
  }
}

function respond(messageType: SessionMessageType, fields: FieldMap): SessionMessage {
  return { protocol: 'session', messageType, fields };
}
