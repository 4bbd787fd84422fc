import { LogLevel } from '@wlanctl/logging';
import { beforeEach, describe, it, expect, vi } from 'vitest';

import { CommandDispatcher } from '../commands/dispatcher.js';
import type { InterfaceEvent } from '../events/types.js';
import { InterfaceLifecycleManager } from '../manager.js';
import { createFakeBackend, fakeMac, type FakeBackend } from '../testing/fakes.js';

describe('CommandDispatcher', () => {
  let backend: FakeBackend;
  let manager: InterfaceLifecycleManager;
  let dispatcher: CommandDispatcher;
  let events: InterfaceEvent[];

  beforeEach(() => {
    backend = createFakeBackend();
    backend.netlink.addRadio('wlan0', 0, [
      ['wlan0', 3],
      ['wlan1', 4],
      ['wlan2', 5],
    ]);
    backend.interfaceTool.extraInterfaces.set('br0', { index: 20, mac: fakeMac(0x20) });
    manager = new InterfaceLifecycleManager(backend);
    events = [];
    manager.registerListener({ onInterfaceEvent: event => events.push(event) });
    dispatcher = new CommandDispatcher(manager, backend.vendorTool, backend.logger);
  });

  const apNames = (): string[] => manager.listApInterfaces().map(iface => iface.getName());

  describe('tokenizing', () => {
    it('should reject commands with more than ten tokens without side effects', async () => {
      const result = await dispatcher.execute('softap qccmd 1 2 3 4 5 6 7 8 9');

      expect(result).toBe(false);
      expect(backend.recorder.calls).toEqual([]);
      expect(backend.transport.getMessages(LogLevel.ERROR)).toEqual(['Command too long']);
    });

    it('should accept exactly ten tokens', async () => {
      const result = await dispatcher.execute('softap qccmd 1 2 3 4 5 6 7 8');

      expect(result).toBe(true);
      expect(backend.recorder.calls).toEqual(['vendor.exec softap qccmd 1 2 3 4 5 6 7 8']);
    });

    it('should honour a configured token limit', async () => {
      const limited = new CommandDispatcher(manager, backend.vendorTool, backend.logger, {
        maxTokens: 3,
      });

      expect(await limited.execute('softap qccmd a b')).toBe(false);
      expect(await limited.execute('softap qccmd a')).toBe(true);
    });

    it('should decode byte commands as UTF-8', async () => {
      const result = await dispatcher.execute(new TextEncoder().encode('softap  create\twlan3'));

      expect(result).toBe(true);
      expect(backend.recorder.calls).toEqual(['vendor.add wlan3']);
    });
  });

  describe('vendor pass-through', () => {
    it('should map create, remove, bridge and setsoftap onto the vendor tool', async () => {
      await dispatcher.execute('softap remove wlan3');
      await dispatcher.execute('softap bridge add br0 wlan1');
      await dispatcher.execute('softap setsoftap set reg_domain US');

      expect(backend.recorder.calls).toEqual([
        'vendor.remove wlan3',
        'vendor.bridge softap bridge add br0 wlan1',
        'vendor.setsoftap softap setsoftap set reg_domain US',
      ]);
    });

    it('should return the vendor tool result', async () => {
      backend.vendorTool.result = false;

      expect(await dispatcher.execute('softap qccmd set ch 6')).toBe(false);
    });

    it('should turn a vendor tool exception into false', async () => {
      vi.spyOn(backend.vendorTool, 'exec').mockRejectedValue(new Error('tool missing'));

      expect(await dispatcher.execute('softap qccmd get')).toBe(false);
      expect(backend.transport.getMessages(LogLevel.ERROR)).toEqual(['Command failed: softap qccmd get']);
    });
  });

  describe('unknown commands', () => {
    it.each(['softap frobnicate x', 'softap startap single', 'softap', '', 'softap create'])(
      'should reject %j',
      async command => {
        expect(await dispatcher.execute(command)).toBe(false);
        expect(backend.recorder.calls).toEqual([]);
      }
    );

    it('should log the rejected command', async () => {
      await dispatcher.execute('softap frobnicate x');

      expect(backend.transport.getMessages(LogLevel.ERROR)).toEqual([
        'Wrong/Unknown command: softap frobnicate x',
      ]);
    });
  });

  describe('single AP', () => {
    it('should create an AP interface and start hostapd', async () => {
      expect(await dispatcher.execute('softap startap')).toBe(true);

      expect(apNames()).toEqual(['wlan0']);
      expect(backend.recorder.matching('hostapd.')).toEqual(['hostapd.start single']);
      expect(dispatcher.getSession()?.dual).toBe(false);
    });

    it('should reject a second start while a session is active', async () => {
      await dispatcher.execute('softap startap');

      expect(await dispatcher.execute('softap startap')).toBe(false);
      expect(apNames()).toEqual(['wlan0']);
      expect(backend.transport.getMessages(LogLevel.ERROR)).toContain('An AP session is already active');
    });

    it('should stop hostapd and tear down the AP interfaces', async () => {
      await dispatcher.execute('softap startap');

      expect(await dispatcher.execute('softap stopap')).toBe(true);

      expect(apNames()).toEqual([]);
      expect(dispatcher.getSession()).toBeUndefined();
      expect(events.map(event => event.kind)).toEqual(['ap-interface-ready', 'ap-interface-torn-down']);
    });

    it('should refuse to stop without a session', async () => {
      expect(await dispatcher.execute('softap stopap')).toBe(false);
      expect(backend.recorder.calls).toEqual([]);
    });

    it('should refuse to stop a session of the other mode', async () => {
      await dispatcher.execute('softap startap');

      expect(await dispatcher.execute('softap stopap dual')).toBe(false);
      expect(apNames()).toEqual(['wlan0']);
    });

    it('should start again after the AP interfaces were torn down by the manager', async () => {
      await dispatcher.execute('softap startap');
      await manager.tearDownAll();

      expect(dispatcher.getSession()).toBeUndefined();
      expect(await dispatcher.execute('softap stopap')).toBe(false);
      expect(await dispatcher.execute('softap startap')).toBe(true);

      expect(apNames()).toEqual(['wlan0']);
      expect(dispatcher.getSession()?.controller.isReleased()).toBe(false);
      expect(backend.recorder.matching('hostapd.start')).toEqual([
        'hostapd.start single',
        'hostapd.start single',
      ]);
    });

    it('should drop the session when only the AP interfaces are torn down', async () => {
      await dispatcher.execute('softap startap dual br0 wlan1 wlan2');
      await manager.tearDownApInterfaces();

      expect(await dispatcher.execute('softap stopap dual')).toBe(false);
      expect(dispatcher.getSession()).toBeUndefined();
      expect(await dispatcher.execute('softap startap')).toBe(true);
    });

    it('should keep the session when hostapd does not stop', async () => {
      await dispatcher.execute('softap startap');
      backend.hostapd.stopResult = false;

      expect(await dispatcher.execute('softap stopap')).toBe(false);
      expect(dispatcher.getSession()).toBeDefined();
    });
  });

  describe('dump', () => {
    it('should report that no session is active', () => {
      expect(dispatcher.dump()).toBe('AP session: none');
    });

    it('should describe the active session', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
      try {
        await dispatcher.execute('softap startap');
      } finally {
        vi.useRealTimers();
      }

      expect(dispatcher.dump()).toBe(
        [
          'AP session:',
          '  Interface name: wlan0',
          '  Mode: single',
          '  Started at: 2026-03-01T12:00:00.000Z',
        ].join('\n')
      );
    });
  });

  describe('dual AP', () => {
    it('should create three named interfaces and start hostapd in dual mode', async () => {
      expect(await dispatcher.execute('softap startap dual br0 wlan1 wlan2')).toBe(true);

      expect(apNames()).toEqual(['br0', 'wlan1', 'wlan2']);
      expect(backend.recorder.matching('hostapd.')).toEqual(['hostapd.start dual']);
      expect(dispatcher.getSession()?.controller.getName()).toBe('br0');
      expect(dispatcher.getSession()?.dual).toBe(true);
    });

    it('should need a bridge and two interfaces', async () => {
      expect(await dispatcher.execute('softap startap dual br0 wlan1')).toBe(false);
      expect(backend.recorder.calls).toEqual([]);
    });

    it('should keep already created interfaces when a later step fails', async () => {
      expect(await dispatcher.execute('softap startap dual br0 wlan1 nope0')).toBe(false);

      expect(apNames()).toEqual(['br0', 'wlan1']);
      expect(backend.recorder.matching('hostapd.')).toEqual([]);
    });

    it('should clean up a partial start with stopap dual', async () => {
      await dispatcher.execute('softap startap dual br0 wlan1 nope0');

      expect(await dispatcher.execute('softap stopap dual')).toBe(true);

      expect(apNames()).toEqual([]);
      expect(backend.recorder.matching('hostapd.')).toEqual(['hostapd.stop dual']);
      expect(dispatcher.getSession()).toBeUndefined();
    });
  });
});
