import {
  ConflictError,
  KernelError,
  NoUsableInterfaceError,
  RadioNotFoundError,
} from '@wlanctl/errors';
import { LogLevel } from '@wlanctl/logging';
import { describe, it, expect } from 'vitest';

import { InterfaceLifecycleManager } from '../manager.js';
import { ApInterfaceState } from '../controllers/ap-interface.js';
import type { InterfaceEvent, InterfaceEventListener } from '../events/types.js';
import { createFakeBackend, fakeMac, type FakeBackend } from '../testing/fakes.js';
import { StationEventKind, createRadioHandle } from '../types.js';

const DEFAULT_INTERFACES: Array<[string, number]> = [
  ['wlan0', 3],
  ['p2p0', 4],
  ['softap0', 5],
  ['aware_data0', 6],
  ['wlan1', 7],
];

function setup(interfaces: Array<[string, number]> = DEFAULT_INTERFACES): {
  backend: FakeBackend;
  manager: InterfaceLifecycleManager;
  events: InterfaceEvent[];
} {
  const backend = createFakeBackend();
  backend.netlink.addRadio('wlan0', 0, interfaces);
  const manager = new InterfaceLifecycleManager(backend);
  const events: InterfaceEvent[] = [];
  manager.registerListener({ onInterfaceEvent: event => events.push(event) });
  return { backend, manager, events };
}

describe('InterfaceLifecycleManager', () => {
  describe('createStationInterface', () => {
    it('should claim the first non-reserved interface and announce it', async () => {
      const { manager, events } = setup();

      const result = await manager.createStationInterface();

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.getName()).toBe('wlan0');
        expect(result.data.getInterfaceIndex()).toBe(3);
        expect(events).toEqual([{ kind: 'station-interface-ready', iface: result.data }]);
      }
      expect(manager.listStationInterfaces()).toHaveLength(1);
    });

    it('should reject a second station interface without touching the kernel', async () => {
      const { backend, manager } = setup();
      await manager.createStationInterface();
      backend.recorder.clear();

      const result = await manager.createStationInterface();

      expect(result.success).toBe(false);
      expect(result.error).toBeInstanceOf(ConflictError);
      expect(backend.recorder.calls).toEqual([]);
      expect(manager.listStationInterfaces()).toHaveLength(1);
    });

    it('should keep the single-station rule for overlapping calls', async () => {
      const { manager } = setup();

      const [first, second] = await Promise.all([
        manager.createStationInterface(),
        manager.createStationInterface(),
      ]);

      expect(first.success).toBe(true);
      expect(second.error).toBeInstanceOf(ConflictError);
    });

    it('should skip p2p0, aware_data and softap interfaces', async () => {
      const { manager } = setup([
        ['p2p0', 4],
        ['softap0', 5],
        ['aware_data0', 6],
        ['wlan1', 7],
      ]);

      const result = await manager.createStationInterface();

      expect(result.data?.getName()).toBe('wlan1');
    });

    it('should only exclude p2p0 by exact name', async () => {
      const { manager } = setup([
        ['p2p0', 4],
        ['p2p0-dev', 8],
      ]);

      const result = await manager.createStationInterface();

      expect(result.data?.getName()).toBe('p2p0-dev');
    });

    it('should fail when every interface is reserved', async () => {
      const { manager, events } = setup([
        ['p2p0', 4],
        ['softap0', 5],
      ]);

      const result = await manager.createStationInterface();

      expect(result.error).toBeInstanceOf(NoUsableInterfaceError);
      expect(events).toEqual([]);
    });

    it('should honour configured reserved names', async () => {
      const backend = createFakeBackend();
      backend.netlink.addRadio('wlan0', 0, [
        ['wlan0', 3],
        ['wlan1', 7],
      ]);
      const manager = new InterfaceLifecycleManager(backend, {
        reservedStationNames: ['wlan0'],
        reservedStationPrefixes: [],
      });

      const result = await manager.createStationInterface();

      expect(result.data?.getName()).toBe('wlan1');
    });

    it('should fail when the base interface has no radio', async () => {
      const backend = createFakeBackend();
      const manager = new InterfaceLifecycleManager(backend);

      const result = await manager.createStationInterface();

      expect(result.error).toBeInstanceOf(RadioNotFoundError);
      expect(result.error?.code).toBe('RADIO_NOT_FOUND');
    });

    it('should fail when interface enumeration fails', async () => {
      const { backend, manager } = setup();
      backend.netlink.failEnumeration = true;

      const result = await manager.createStationInterface();

      expect(result.error).toBeInstanceOf(KernelError);
      expect(result.error?.message).toBe('Failed to get interfaces info from kernel');
      expect(manager.getCachedInterfaces()).toEqual([]);
    });
  });

  describe('createAccessPointInterface', () => {
    it('should claim the first unclaimed interface and subscribe to its station events', async () => {
      const { backend, manager, events } = setup([
        ['wlan0', 3],
        ['wlan1', 7],
      ]);
      await manager.createStationInterface();

      const result = await manager.createAccessPointInterface();

      expect(result.data?.getName()).toBe('wlan1');
      expect(backend.recorder.calls).toContain('netlink.subscribeStationEvents 7');
      expect(events.map(event => event.kind)).toEqual([
        'station-interface-ready',
        'ap-interface-ready',
      ]);
    });

    it('should allow several AP interfaces', async () => {
      const { manager } = setup([
        ['wlan0', 3],
        ['wlan1', 7],
      ]);

      await manager.createAccessPointInterface();
      await manager.createAccessPointInterface();
      const third = await manager.createAccessPointInterface();

      expect(manager.listApInterfaces().map(iface => iface.getName())).toEqual(['wlan0', 'wlan1']);
      expect(third.error).toBeInstanceOf(NoUsableInterfaceError);
    });
  });

  describe('createNamedAccessPointInterface', () => {
    it('should select the first interface whose name starts with the request', async () => {
      const { manager } = setup([
        ['wlan0', 3],
        ['wlan1', 7],
      ]);

      expect((await manager.createNamedAccessPointInterface('wlan1')).data?.getInterfaceIndex()).toBe(7);
      expect((await manager.createNamedAccessPointInterface('wlan')).data?.getName()).toBe('wlan0');
    });

    it('should fall back to a bridge interface looked up by name', async () => {
      const { backend, manager } = setup([['wlan0', 3]]);
      backend.interfaceTool.extraInterfaces.set('br0', { index: 20, mac: fakeMac(0x20) });

      const result = await manager.createNamedAccessPointInterface('br0');

      expect(result.success).toBe(true);
      expect(result.data?.descriptor).toEqual({
        name: 'br0',
        kernelIndex: 20,
        macAddress: [0x02, 0x00, 0x00, 0x00, 0x00, 0x20],
      });
      expect(Object.isFrozen(result.data?.descriptor)).toBe(true);
    });

    it('should fail when neither the radio nor the host knows the name', async () => {
      const { manager } = setup([['wlan0', 3]]);

      const result = await manager.createNamedAccessPointInterface('br9');

      expect(result.error).toBeInstanceOf(NoUsableInterfaceError);
      expect(result.error?.message).toBe('No usable interface found with name br9');
    });

    it('should refuse an interface another controller already owns', async () => {
      const { manager } = setup([['wlan0', 3]]);
      await manager.createNamedAccessPointInterface('wlan0');

      const result = await manager.createNamedAccessPointInterface('wlan0');

      expect(result.error).toBeInstanceOf(ConflictError);
      expect(manager.listApInterfaces()).toHaveLength(1);
    });
  });

  describe('teardown', () => {
    it('should notify, unsubscribe, stop the daemon and set the interface down in that order', async () => {
      const { backend, manager } = setup([['wlan0', 3]]);
      const created = await manager.createAccessPointInterface();
      if (!created.success) {
        throw created.error;
      }
      await created.data.startDaemon();
      manager.registerListener({
        onInterfaceEvent: event => backend.recorder.record(`listener ${event.kind}`),
      });
      backend.recorder.clear();

      await manager.tearDownApInterfaces();

      expect(backend.recorder.calls).toEqual([
        'listener ap-interface-torn-down',
        'netlink.unsubscribe station 3',
        'hostapd.stop single',
        'ifaceTool.setUpState wlan0 down',
        'netlink.setInterfaceMode 3 station',
      ]);
      expect(created.data.getState()).toBe(ApInterfaceState.RELEASED);
      expect(manager.listApInterfaces()).toEqual([]);
    });

    it('should drop station events still queued when the interface is torn down', async () => {
      const { backend, manager, events } = setup([['wlan0', 3]]);
      const created = await manager.createAccessPointInterface();
      if (!created.success) {
        throw created.error;
      }

      expect(backend.netlink.hub.publishStationEvent(3, StationEventKind.JOINED, fakeMac(1))).toBe(true);
      await manager.tearDownApInterfaces();
      await backend.netlink.hub.flush();

      expect(created.data.getAssociatedStationCount()).toBe(0);
      expect(events.map(event => event.kind)).toEqual(['ap-interface-ready', 'ap-interface-torn-down']);
      expect(backend.netlink.hub.publishStationEvent(3, StationEventKind.JOINED, fakeMac(1))).toBe(false);
    });

    it('should drop regulatory domain changes still queued when everything is torn down', async () => {
      const { backend, manager } = setup([['wlan0', 3]]);
      await manager.createStationInterface();

      expect(backend.netlink.hub.publishRegDomainChange(createRadioHandle(0), 'US')).toBe(true);
      await manager.tearDownAll();
      await backend.netlink.hub.flush();

      expect(
        backend.transport
          .getMessages(LogLevel.INFO)
          .filter(message => message.startsWith('Regulatory domain changed'))
      ).toEqual([]);
      expect(backend.recorder.matching('netlink.getSupportedBands')).toEqual([]);
      expect(backend.netlink.hub.publishRegDomainChange(createRadioHandle(0), 'US')).toBe(false);
    });

    it('should only tear down the requested kind', async () => {
      const { manager } = setup([
        ['wlan0', 3],
        ['wlan1', 7],
      ]);
      await manager.createStationInterface();
      await manager.createAccessPointInterface();

      await manager.tearDownStationInterfaces();

      expect(manager.listStationInterfaces()).toEqual([]);
      expect(manager.listApInterfaces()).toHaveLength(1);
    });

    it('should release everything and mark every radio interface down on tearDownAll', async () => {
      const { backend, manager, events } = setup([
        ['wlan0', 3],
        ['wlan1', 7],
      ]);
      await manager.createStationInterface();
      await manager.createAccessPointInterface();
      backend.recorder.clear();

      await manager.tearDownAll();

      expect(events.map(event => event.kind)).toEqual([
        'station-interface-ready',
        'ap-interface-ready',
        'station-interface-torn-down',
        'ap-interface-torn-down',
      ]);
      expect(manager.listStationInterfaces()).toEqual([]);
      expect(manager.listApInterfaces()).toEqual([]);
      expect(backend.recorder.matching('ifaceTool.setUpState').slice(-2)).toEqual([
        'ifaceTool.setUpState wlan0 down',
        'ifaceTool.setUpState wlan1 down',
      ]);
      expect(backend.recorder.calls.at(-1)).toBe('netlink.unsubscribe reg-domain 0');
      expect(backend.netlink.hub.getActiveSubscriptionCount()).toBe(0);
    });

    it('should keep going when marking interfaces down fails', async () => {
      const { backend, manager } = setup([['wlan0', 3]]);
      await manager.createStationInterface();
      backend.interfaceTool.setUpStateResult = false;

      await expect(manager.tearDownAll()).resolves.toBeUndefined();

      expect(manager.listStationInterfaces()).toEqual([]);
      expect(backend.transport.getMessages(LogLevel.WARN)).toContain(
        'Failed to set interface wlan0 down'
      );
    });

    it('should allow a new station interface after teardown', async () => {
      const { manager } = setup([['wlan0', 3]]);
      const first = await manager.createStationInterface();
      await manager.tearDownStationInterfaces();

      const second = await manager.createStationInterface();

      expect(second.success).toBe(true);
      expect(second.data).not.toBe(first.data);
    });
  });

  describe('associated stations', () => {
    it('should never count below zero and log the underflow once', async () => {
      const { backend, manager, events } = setup([['wlan0', 3]]);
      const created = await manager.createAccessPointInterface();
      if (!created.success) {
        throw created.error;
      }
      const hub = backend.netlink.hub;

      hub.publishStationEvent(3, StationEventKind.JOINED, fakeMac(1));
      await hub.flush();
      expect(created.data.getAssociatedStationCount()).toBe(1);

      hub.publishStationEvent(3, StationEventKind.LEFT, fakeMac(1));
      hub.publishStationEvent(3, StationEventKind.LEFT, fakeMac(2));
      await hub.flush();

      expect(created.data.getAssociatedStationCount()).toBe(0);
      expect(
        backend.transport
          .getMessages(LogLevel.WARN)
          .filter(message => message === 'Received station left event when station count is 0')
      ).toHaveLength(1);
      expect(
        events.flatMap(event => (event.kind === 'softap-client' ? [event.connected] : []))
      ).toEqual([true, false]);
    });
  });

  describe('associated station sequences', () => {
    const UNDERFLOW = 'Received station left event when station count is 0';

    // Every joined/left sequence of length 1 to 6
    const sequences: StationEventKind[][] = [];
    for (let length = 1; length <= 6; length++) {
      for (let bits = 0; bits < 1 << length; bits++) {
        sequences.push(
          Array.from({ length }, (_, position) =>
            (bits >> position) & 1 ? StationEventKind.LEFT : StationEventKind.JOINED
          )
        );
      }
    }

    it('should keep the count at the clamped tally for every interleaving', async () => {
      expect(sequences).toHaveLength(126);

      for (const sequence of sequences) {
        const { backend, manager } = setup([['wlan0', 3]]);
        const created = await manager.createAccessPointInterface();
        if (!created.success) {
          throw created.error;
        }

        let expected = 0;
        let underflows = 0;
        sequence.forEach((kind, position) => {
          if (kind === StationEventKind.JOINED) {
            expected++;
          } else if (expected === 0) {
            underflows++;
          } else {
            expected--;
          }

          created.data.onStationEvent(kind, fakeMac(position));

          expect(created.data.getAssociatedStationCount()).toBeGreaterThanOrEqual(0);
          expect(created.data.getAssociatedStationCount()).toBe(expected);
        });

        expect(
          backend.transport.getMessages(LogLevel.WARN).filter(message => message === UNDERFLOW)
        ).toHaveLength(underflows);
      }
    });
  });

  describe('regulatory domain', () => {
    it('should log the country and the supported bands', async () => {
      const { backend, manager } = setup([['wlan0', 3]]);
      await manager.createStationInterface();

      backend.netlink.hub.publishRegDomainChange(createRadioHandle(0), 'US');
      await backend.netlink.hub.flush();

      const info = backend.transport.getMessages(LogLevel.INFO);
      expect(info).toContain('Regulatory domain changed to country: US');
      expect(info).toContain('2.4Ghz frequencies: 2412 2437');
      expect(info).toContain('5Ghz non-DFS frequencies: 5180');
      expect(info).toContain('5Ghz DFS frequencies: 5260');
    });

    it('should report an empty country as unknown', async () => {
      const { backend, manager } = setup([['wlan0', 3]]);

      await manager.onRegulatoryDomainChanged('');

      expect(backend.transport.getMessages(LogLevel.INFO)).toContain(
        'Regulatory domain changed to country: unknown'
      );
    });

    it('should keep a single subscription across creations', async () => {
      const { backend, manager } = setup([
        ['wlan0', 3],
        ['wlan1', 7],
      ]);
      await manager.createStationInterface();
      await manager.createAccessPointInterface();

      backend.netlink.hub.publishRegDomainChange(createRadioHandle(0), 'DE');
      await backend.netlink.hub.flush();

      expect(
        backend.transport
          .getMessages(LogLevel.INFO)
          .filter(message => message === 'Regulatory domain changed to country: DE')
      ).toHaveLength(1);
    });

    it('should log a failed band query', async () => {
      const { backend, manager } = setup([['wlan0', 3]]);
      await manager.createStationInterface();
      backend.netlink.failBands = true;

      await manager.onRegulatoryDomainChanged('FR');

      expect(backend.transport.getMessages(LogLevel.ERROR)).toContain(
        'Failed to get supported bands after regulatory domain change'
      );
    });
  });

  describe('cleanUpSystemState', () => {
    it('should stop both daemons before marking interfaces down', async () => {
      const { backend, manager } = setup([
        ['wlan0', 3],
        ['wlan1', 7],
      ]);

      await manager.cleanUpSystemState();

      expect(backend.recorder.calls).toEqual([
        'supplicant.stop',
        'hostapd.stop single',
        'hostapd.stop dual',
        'netlink.resolveRadio wlan0',
        'netlink.enumerateInterfaces 0',
        'ifaceTool.setUpState wlan0 down',
        'ifaceTool.setUpState wlan1 down',
      ]);
    });

    it('should not follow regulatory domain changes or cache the interfaces', async () => {
      const { backend, manager } = setup([['wlan0', 3]]);

      await manager.cleanUpSystemState();

      expect(backend.netlink.hub.getActiveSubscriptionCount()).toBe(0);
      expect(backend.netlink.hub.publishRegDomainChange(createRadioHandle(0), 'US')).toBe(false);
      expect(manager.getRadio()).toBeUndefined();
      expect(manager.getCachedInterfaces()).toEqual([]);
    });
  });

  describe('listeners', () => {
    it('should ignore duplicate registrations', () => {
      const { manager } = setup();
      const listener: InterfaceEventListener = { onInterfaceEvent: () => undefined };

      expect(manager.registerListener(listener)).toBe(true);
      expect(manager.registerListener(listener)).toBe(false);
      expect(manager.unregisterListener(listener)).toBe(true);
      expect(manager.unregisterListener(listener)).toBe(false);
    });
  });

  describe('dump', () => {
    it('should describe the radio, the cached interfaces and each controller', async () => {
      const { backend, manager } = setup([
        ['wlan0', 3],
        ['wlan1', 7],
      ]);
      await manager.createAccessPointInterface();
      backend.netlink.hub.publishStationEvent(3, StationEventKind.JOINED, fakeMac(9));
      await backend.netlink.hub.flush();

      expect(manager.dump()).toBe(
        [
          'Current wiphy index: 0',
          'Cached interfaces list from kernel message:',
          'Interface index: 3, name: wlan0, mac address: 02:00:00:00:00:03',
          'Interface index: 7, name: wlan1, mac address: 02:00:00:00:00:07',
          'AP interface:',
          '  Interface index: 3',
          '  Interface name: wlan0',
          '  Interface mac address: 02:00:00:00:00:03',
          '  State: created',
          '  Number of associated stations: 1',
        ].join('\n')
      );
    });

    it('should report an unresolved radio', () => {
      const { manager } = setup();

      expect(manager.dump()).toBe(
        ['Current wiphy index: unknown', 'Cached interfaces list from kernel message:'].join('\n')
      );
    });
  });
});
