import {
  ConfigGenerationError,
  ConflictError,
  DaemonStartError,
  DaemonStopError,
  ModeResetError,
} from '@wlanctl/errors';
import { LogLevel } from '@wlanctl/logging';
import { beforeEach, describe, it, expect } from 'vitest';

import { AccessPointInterfaceController, ApInterfaceState } from '../controllers/ap-interface.js';
import { EventListenerRegistry } from '../events/registry.js';
import { createFakeBackend, fakeMac, type FakeBackend } from '../testing/fakes.js';
import {
  EncryptionType,
  StationEventKind,
  createInterfaceDescriptor,
  type ApDaemonSettings,
} from '../types.js';

const settings: ApDaemonSettings = {
  ssid: new TextEncoder().encode('field-net'),
  hidden: false,
  channel: 6,
  encryption: EncryptionType.WPA2,
  passphrase: new TextEncoder().encode('test-secret'),
};

describe('AccessPointInterfaceController', () => {
  let backend: FakeBackend;
  let controller: AccessPointInterfaceController;

  beforeEach(() => {
    backend = createFakeBackend();
    controller = new AccessPointInterfaceController(createInterfaceDescriptor('wlan1', 7, fakeMac(7)), {
      netlink: backend.netlink,
      interfaceTool: backend.interfaceTool,
      hostapd: backend.hostapd,
      listeners: new EventListenerRegistry(backend.logger),
      logger: backend.logger,
    });
    backend.recorder.clear();
  });

  describe('writeDaemonConfig', () => {
    it('should build and write the hostapd config', async () => {
      const result = await controller.writeDaemonConfig(settings);

      expect(result.success).toBe(true);
      expect(backend.hostapd.writtenConfigs).toEqual([
        { config: 'interface=wlan1\nchannel=6\n', dual: false },
      ]);
    });

    it('should fail when no config can be built', async () => {
      const result = await controller.writeDaemonConfig({ ...settings, ssid: new Uint8Array() });

      expect(result.error).toBeInstanceOf(ConfigGenerationError);
      expect(result.error?.message).toBe('Failed to construct hostapd config');
      expect(backend.hostapd.writtenConfigs).toEqual([]);
    });

    it('should fail when the config cannot be written', async () => {
      backend.hostapd.writeResult = false;

      const result = await controller.writeDaemonConfig(settings, true);

      expect(result.error).toBeInstanceOf(ConfigGenerationError);
      expect(result.error?.message).toBe('Failed to write hostapd config');
    });
  });

  describe('startDaemon', () => {
    it('should move to running on success', async () => {
      const result = await controller.startDaemon(true);

      expect(result.success).toBe(true);
      expect(controller.getState()).toBe(ApInterfaceState.RUNNING);
      expect(backend.recorder.calls).toEqual(['hostapd.start dual']);
    });

    it('should stay created when hostapd does not start', async () => {
      backend.hostapd.startResult = false;

      const result = await controller.startDaemon();

      expect(result.error).toBeInstanceOf(DaemonStartError);
      expect(controller.getState()).toBe(ApInterfaceState.CREATED);
    });

    it('should restart after a stop', async () => {
      await controller.startDaemon();
      await controller.stopDaemon();

      const result = await controller.startDaemon();

      expect(result.success).toBe(true);
      expect(controller.getState()).toBe(ApInterfaceState.RUNNING);
    });
  });

  describe('stopDaemon', () => {
    it('should run every step even when hostapd fails to stop', async () => {
      await controller.startDaemon();
      backend.recorder.clear();
      backend.hostapd.stopResult = false;

      const result = await controller.stopDaemon();

      expect(result.error).toBeInstanceOf(DaemonStopError);
      expect(backend.recorder.calls).toEqual([
        'hostapd.stop single',
        'ifaceTool.setUpState wlan1 down',
        'netlink.setInterfaceMode 7 station',
      ]);
      expect(controller.getState()).toBe(ApInterfaceState.STOPPED);
    });

    it('should report a failed mode reset ahead of a failed stop', async () => {
      backend.hostapd.stopResult = false;
      backend.netlink.modeResetResult = false;

      const result = await controller.stopDaemon();

      expect(result.error).toBeInstanceOf(ModeResetError);
      expect(result.error?.code).toBe('MODE_RESET_FAILED');
    });

    it('should only log a failed interface down', async () => {
      backend.interfaceTool.setUpStateResult = false;

      const result = await controller.stopDaemon();

      expect(result.success).toBe(true);
      expect(backend.transport.getMessages(LogLevel.WARN)).toEqual(['Failed to set interface down']);
    });
  });

  describe('release', () => {
    it('should be idempotent', async () => {
      await Promise.all([controller.release(), controller.release()]);
      await controller.release();

      expect(backend.recorder.matching('netlink.unsubscribe')).toEqual(['netlink.unsubscribe station 7']);
      expect(controller.isReleased()).toBe(true);
      expect(controller.getState()).toBe(ApInterfaceState.RELEASED);
    });

    it('should ignore station events and refuse to start afterwards', async () => {
      await controller.release();

      controller.onStationEvent(StationEventKind.JOINED, fakeMac(1));
      const result = await controller.startDaemon();

      expect(controller.getAssociatedStationCount()).toBe(0);
      expect(result.error).toBeInstanceOf(ConflictError);
    });
  });

  it('should count stations joining and leaving', () => {
    controller.onStationEvent(StationEventKind.JOINED, fakeMac(1));
    controller.onStationEvent(StationEventKind.JOINED, fakeMac(2));
    controller.onStationEvent(StationEventKind.LEFT, fakeMac(1));

    expect(controller.getAssociatedStationCount()).toBe(1);
    expect(backend.transport.getMessages(LogLevel.INFO)).toContain(
      'New station 02:00:00:00:00:02 connected to hotspot using interface wlan1'
    );
  });
});
