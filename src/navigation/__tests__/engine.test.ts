/**
 * Navigation Engine Tests
 *
 * Drives the engine against an in-memory surface host and a real config
 * store writing to a temp file.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { readFileSync, writeFileSync } from 'node:fs';
import { NavigationEngine } from '../engine.js';
import { PanelKind } from '../types.js';
import type { Config } from '../../config/index.js';
import { CLIError, HostApiError, InvalidArgumentError } from '../../errors/index.js';
import { ConfigStore } from '../../terminal/config-store.js';
import {
  FakeSurfaceHost,
  RecordingLogger,
  createTempTerminalConfig,
  type TempTerminalConfig,
} from '../../test-utils/index.js';

const CATALOG = new Map([
  ['Arial', 'Arial'],
  ['FiraCode', 'Fira Code'],
  ['Hack', 'Hack'],
]);

const MENU_LABELS = ['Check current font', 'Set font family', 'Set font size', 'Show installed fonts'];

describe('NavigationEngine', () => {
  let temp: TempTerminalConfig;
  let config: Config;
  let host: FakeSurfaceHost;
  let logger: RecordingLogger;
  let reload: Mock<() => number>;
  let names: string[];
  let store: ConfigStore;
  let engine: NavigationEngine;

  const writeTerminalConfig = (content: string): void => {
    writeFileSync(temp.path, content, 'utf-8');
  };
  const fileContent = (): string => readFileSync(temp.path, 'utf-8');

  beforeEach(() => {
    temp = createTempTerminalConfig('font_family Fira Code\nfont_size 12.0\n');
    config = temp.config;
    host = new FakeSurfaceHost({ viewport: { rows: 40, cols: 120 } });
    logger = new RecordingLogger();
    reload = vi.fn<() => number>(() => 1);
    names = ['Arial', 'Fira Code', 'Hack'];

    store = new ConfigStore({
      getConfig: () => config,
      fonts: { resolve: (key) => CATALOG.get(key) },
      reloader: { reload },
    });

    engine = new NavigationEngine({
      host,
      store,
      fonts: { displayNames: () => names },
      getConfig: () => config,
      logger,
    });
  });

  afterEach(() => {
    temp.cleanup();
  });

  describe('open and close', () => {
    it('starts closed', () => {
      expect(engine.state).toBe('closed');
      expect(engine.current).toBeNull();
    });

    it('opens the main menu centred in the viewport', () => {
      expect(engine.open(PanelKind.MAIN_MENU)).toBe(true);

      expect(engine.state).toBe(PanelKind.MAIN_MENU);
      expect(host.live).toHaveLength(1);
      expect(host.last?.spec).toEqual({
        row: 18,
        col: 48,
        width: 24,
        height: 4,
        title: ' fontctl ',
        border: 'single',
        lines: MENU_LABELS,
        cursor: 0,
      });
    });

    it('uses the configured border style', () => {
      config = { ...config, border: 'rounded' };
      engine.open(PanelKind.MAIN_MENU);

      expect(host.last?.spec.border).toBe('rounded');
    });

    it('reports a second open as a notice and keeps the first panel', () => {
      engine.open(PanelKind.MAIN_MENU);

      expect(engine.open(PanelKind.FONT_INFO)).toBe(false);
      expect(logger.messages('info')).toEqual(['Panel is already open']);
      expect(engine.state).toBe(PanelKind.MAIN_MENU);
      expect(host.panels).toHaveLength(1);
    });

    it('reports closing while closed as a notice', () => {
      expect(engine.close()).toBe(false);
      expect(logger.messages('info')).toEqual(['Panel is already closed']);
    });

    it('releases the surface on close', () => {
      engine.open(PanelKind.FONT_INFO);

      expect(engine.close()).toBe(true);
      expect(engine.state).toBe('closed');
      expect(host.last?.destroyed).toBe(true);
    });

    it('wraps host failures in HostApiError and stays closed', () => {
      host.failCreate = 'no terminal';

      expect(() => engine.open(PanelKind.MAIN_MENU)).toThrow(HostApiError);
      expect(() => engine.open(PanelKind.MAIN_MENU)).toThrow('Could not open panel: no terminal');
      expect(engine.state).toBe('closed');
    });

    it('ignores keys while closed', () => {
      engine.handleKey('enter');

      expect(engine.state).toBe('closed');
      expect(host.panels).toHaveLength(0);
    });
  });

  describe('main menu', () => {
    beforeEach(() => {
      engine.open(PanelKind.MAIN_MENU);
    });

    it('moves the cursor and updates the surface', () => {
      engine.handleKey('down');
      engine.handleKey('down');

      expect(host.last?.cursor).toBe(2);
    });

    it('clamps the cursor at both ends', () => {
      engine.handleKey('up');
      expect(host.last?.cursor).toBe(0);

      for (let i = 0; i < 10; i++) engine.handleKey('down');
      expect(host.last?.cursor).toBe(3);
    });

    it('replaces itself with the selected panel', () => {
      const menu = host.last;
      engine.handleKey('down');
      engine.handleKey('enter');

      expect(engine.state).toBe(PanelKind.FAMILY_PICKER);
      expect(menu?.destroyed).toBe(true);
      expect(host.live).toHaveLength(1);
      expect(host.last?.spec.title).toBe(' Choose font family ');
    });

    it('closes on escape', () => {
      engine.handleKey('escape');

      expect(engine.state).toBe('closed');
      expect(host.live).toHaveLength(0);
    });

    it('closes on quit', () => {
      engine.handleKey('quit');

      expect(engine.state).toBe('closed');
    });
  });

  describe('family picker', () => {
    it('pre-selects the current family', () => {
      engine.open(PanelKind.FAMILY_PICKER);

      expect(host.last?.spec.lines).toEqual(['Arial', 'Fira Code', 'Hack']);
      expect(host.last?.spec.cursor).toBe(1);
      expect(host.last?.spec.height).toBe(3);
      expect(host.last?.spec.width).toBe(30);
    });

    it('starts at the top when the current family is not listed', () => {
      writeTerminalConfig('font_family FiraCode\nfont_size 12.0\n');
      engine.open(PanelKind.FAMILY_PICKER);

      expect(host.last?.spec.cursor).toBe(0);
    });

    it('limits its height to ten rows', () => {
      names = Array.from({ length: 15 }, (_, i) => `Font ${String(i).padStart(2, '0')}`);
      engine.open(PanelKind.FAMILY_PICKER);

      expect(host.last?.spec.height).toBe(10);
    });

    it('sets the selected family and stays open', () => {
      engine.open(PanelKind.FAMILY_PICKER);
      engine.handleKey('down');
      engine.handleKey('enter');

      expect(fileContent()).toBe('font_family Hack\nfont_size 12.0\n');
      expect(logger.messages('info')).toEqual(['Font family set to Hack']);
      expect(reload).toHaveBeenCalledTimes(1);
      expect(engine.state).toBe(PanelKind.FAMILY_PICKER);
    });

    it('refuses to open without compatible fonts', () => {
      names = [];

      expect(() => engine.open(PanelKind.FAMILY_PICKER)).toThrow(CLIError);
      expect(() => engine.open(PanelKind.FAMILY_PICKER)).toThrow('No compatible fonts found');
      expect(engine.state).toBe('closed');
      expect(host.panels).toHaveLength(0);
    });

    it('goes back to the main menu on backspace', () => {
      engine.open(PanelKind.FAMILY_PICKER);
      const picker = host.last;
      engine.handleKey('backspace');

      expect(picker?.destroyed).toBe(true);
      expect(engine.state).toBe(PanelKind.MAIN_MENU);
      expect(host.live).toHaveLength(1);
    });
  });

  describe('size control', () => {
    it('shows the current size', () => {
      engine.open(PanelKind.SIZE_CONTROL);

      expect(host.last?.spec).toMatchObject({
        title: ' Change font size ',
        width: 25,
        height: 3,
        lines: ['', 'Current size: [ 12 ]', ''],
      });
    });

    it('increments by 0.5, writes the file and redraws without closing', () => {
      engine.open(PanelKind.SIZE_CONTROL);
      engine.handleKey('increment');

      expect(fileContent()).toBe('font_family Fira Code\nfont_size 12.5\n');
      expect(host.last?.lines).toEqual(['', 'Current size: [ 12.5 ]', '']);
      expect(engine.state).toBe(PanelKind.SIZE_CONTROL);
      expect(host.live).toHaveLength(1);
      expect(reload).toHaveBeenCalledTimes(1);
    });

    it('decrements on down', () => {
      engine.open(PanelKind.SIZE_CONTROL);
      engine.handleKey('down');
      engine.handleKey('decrement');

      expect(fileContent()).toBe('font_family Fira Code\nfont_size 11\n');
      expect(host.last?.lines).toEqual(['', 'Current size: [ 11 ]', '']);
    });

    it('refuses to open when the size is not a number', () => {
      writeTerminalConfig('font_family Fira Code\n');

      expect(() => engine.open(PanelKind.SIZE_CONTROL)).toThrow(InvalidArgumentError);
      expect(() => engine.open(PanelKind.SIZE_CONTROL)).toThrow(
        'Font size in the terminal config is not a number: default'
      );
      expect(engine.state).toBe('closed');
    });

    it('never goes to zero', () => {
      writeTerminalConfig('font_size 0.5\n');
      engine.open(PanelKind.SIZE_CONTROL);

      expect(() => engine.handleKey('decrement')).toThrow('Font size cannot go below 0.5');
      expect(fileContent()).toBe('font_size 0.5\n');
      expect(engine.state).toBe(PanelKind.SIZE_CONTROL);
    });

    it('steps from the shown size when the file repeats font_size', () => {
      writeTerminalConfig('font_size 10\nfont_family Arial\nfont_size 12\n');
      engine.open(PanelKind.SIZE_CONTROL);
      engine.handleKey('increment');
      engine.handleKey('increment');

      expect(host.last?.lines).toEqual(['', 'Current size: [ 13 ]', '']);
      expect(fileContent()).toBe('font_size 13\nfont_family Arial\nfont_size 12\n');
    });

    it('goes back to the main menu on escape', () => {
      engine.open(PanelKind.SIZE_CONTROL);
      engine.handleKey('escape');

      expect(engine.state).toBe(PanelKind.MAIN_MENU);
    });
  });

  describe('adjustSize', () => {
    it('works with no panel open', () => {
      expect(engine.adjustSize(1)).toBe(12.5);
      expect(fileContent()).toBe('font_family Fira Code\nfont_size 12.5\n');
      expect(engine.state).toBe('closed');
    });
  });

  describe('info and list panels', () => {
    it('shows the current font', () => {
      engine.open(PanelKind.FONT_INFO);

      expect(host.last?.spec.lines).toEqual(['Family: Fira Code', 'Size:   12.0']);
    });

    it('shows (not set) for a missing family', () => {
      writeTerminalConfig('font_size 12.0\n');
      engine.open(PanelKind.FONT_INFO);

      expect(host.last?.spec.lines).toEqual(['Family: (not set)', 'Size:   12.0']);
    });

    it('lays the font list out in columns', () => {
      engine.open(PanelKind.FONT_LIST);

      expect(host.last?.spec.title).toBe(' Available fonts ');
      expect(host.last?.spec.lines).toEqual(['Arial      Fira Code  Hack']);
    });

    it('says so when there are no fonts', () => {
      names = [];
      engine.open(PanelKind.FONT_LIST);

      expect(host.last?.spec.lines).toEqual(['No compatible fonts found']);
    });

    it('scrolls a list taller than the viewport', () => {
      const small = new FakeSurfaceHost({ viewport: { rows: 10, cols: 40 } });
      names = Array.from({ length: 30 }, (_, i) => `Font ${String(i + 1).padStart(2, '0')}`);
      const listEngine = new NavigationEngine({
        host: small,
        store,
        fonts: { displayNames: () => names },
        getConfig: () => config,
      });

      listEngine.open(PanelKind.FONT_LIST);
      const panel = small.last;
      expect(panel?.spec.lines).toHaveLength(10);
      expect(panel?.spec.lines[9]).toBe('Font 10  Font 20  Font 30');
      expect(panel?.spec.height).toBe(8);

      listEngine.handleKey('down');
      listEngine.handleKey('down');
      listEngine.handleKey('down');
      expect(panel?.scroll).toBe(2);
      expect(listEngine.current).toMatchObject({ scroll: 2, visibleRows: 8 });

      listEngine.handleKey('up');
      expect(panel?.scroll).toBe(1);
      expect(listEngine.state).toBe(PanelKind.FONT_LIST);
    });

    it('does not scroll a list that fits', () => {
      engine.open(PanelKind.FONT_LIST);
      engine.handleKey('down');

      expect(host.last?.scroll).toBe(0);
      expect(engine.current).toMatchObject({ scroll: 0, visibleRows: 1 });
    });

    it('goes back on escape and closes on quit', () => {
      engine.open(PanelKind.FONT_LIST);
      engine.handleKey('escape');
      expect(engine.state).toBe(PanelKind.MAIN_MENU);

      engine.handleKey('quit');
      expect(engine.state).toBe('closed');
      expect(host.live).toHaveLength(0);
    });
  });
});
