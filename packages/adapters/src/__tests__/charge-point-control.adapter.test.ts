import { describe, it, expect, beforeEach } from '@jest/globals';
import type { ControlMessage, FieldMap } from '@evsim/domain';
import { ChargePointControlAdapter } from '../protocols/charge-point-control.adapter.js';

let seq = 0;
function call(action: string, payload: FieldMap = {}): ControlMessage {
  return { protocol: 'control', messageType: 'CALL', messageId: `m-${++seq}`, action, payload };
}

describe('ChargePointControlAdapter', () => {
  let adapter: ChargePointControlAdapter;

  beforeEach(() => {
    adapter = new ChargePointControlAdapter({ now: () => 0, heartbeatIntervalSec: 60 });
  });

  it('accepts a boot notification and pins the identity', async () => {
    const res = await adapter.send(call('BootNotification', { chargePointId: 'CP-1' }));
    expect(res?.messageType).toBe('CALL_RESULT');
    expect(res?.payload).toEqual({ status: 'Accepted', currentTime: '1970-01-01T00:00:00.000Z', interval: 60 });
    expect(adapter.statistics().chargePointId).toBe('CP-1');
  });

  it('refuses calls that claim another identity after boot', async () => {
    await adapter.send(call('BootNotification', { chargePointId: 'CP-1' }));
    const res = await adapter.send(call('Heartbeat', { chargePointId: 'CP-ROGUE' }));
    expect(res?.messageType).toBe('CALL_ERROR');
    expect(res?.payload['errorCode']).toBe('SecurityError');
    expect(adapter.statistics().callErrors).toBe(1);
  });

  it('answers unknown actions with NotImplemented', async () => {
    const res = await adapter.send(call('InjectedCommand'));
    expect(res?.payload['errorCode']).toBe('NotImplemented');
  });

  it('ignores anything that is not a call', async () => {
    const res = await adapter.send({
      protocol: 'control',
      messageType: 'CALL_RESULT',
      messageId: 'x',
      action: 'Heartbeat',
      payload: {},
    });
    expect(res).toBeNull();
    expect(adapter.statistics().callsHandled).toBe(0);
  });

  it('tracks transactions and the reported energy', async () => {
    const start = await adapter.send(call('StartTransaction', { idTag: 'TAG-1' }));
    const transactionId = start?.payload['transactionId'];
    expect(transactionId).toBe(1);
    expect(adapter.statistics().activeTransactions).toBe(1);

    await adapter.send(call('MeterValues', { energyWh: 12.5 }));
    expect(adapter.statistics().reportedEnergyWh).toBe(12.5);

    const stop = await adapter.send(call('StopTransaction', { transactionId: 1, meterStop: 20 }));
    expect(stop?.payload['idTagStatus']).toBe('Accepted');

    const stats = adapter.statistics();
    expect(stats.activeTransactions).toBe(0);
    expect(stats.reportedEnergyWh).toBe(20);
    expect(stats.callsByAction).toEqual({ StartTransaction: 1, MeterValues: 1, StopTransaction: 1 });
  });

  it('does not take meterStop from an unknown transaction', async () => {
    await adapter.send(call('MeterValues', { energyWh: 5 }));
    const stop = await adapter.send(call('StopTransaction', { transactionId: 99, meterStop: 500 }));
    expect(stop?.payload['idTagStatus']).toBe('Invalid');
    expect(adapter.statistics().reportedEnergyWh).toBe(5);
  });
});
