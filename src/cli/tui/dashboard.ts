import readline from 'node:readline';
import { toSourceOptions, toStationStateOptions, type MonitorConfig } from '../../config/index.js';
import { StationState } from '../../core/station-state.js';
import { selectRenderer } from '../../display/renderer.js';
import { createScreen } from '../../display/screen.js';
import { Monitor } from '../../runner/monitor.js';
import { PwsSource } from '../../source/pws.js';
import colors from '../../utils/colors.js';
import type { Logger } from '../../utils/logger.js';

type Keypress = { name?: string; ctrl?: boolean };

/**
 * Run the live dashboard until ESC, Ctrl+C, SIGINT or SIGTERM
 */
export async function startDashboard(config: MonitorConfig, logger: Logger): Promise<void> {
  const renderer = selectRenderer({ plain: config.plain });
  const screen = createScreen(renderer.capability);
  const state = new StationState(toStationStateOptions(config));
  const source = new PwsSource({ ...toSourceOptions(config), logger });

  logger.debug(
    `Station ${config.stationId}: every ${config.interval}s, ${config.capacity} samples, ` +
    `${config.sparklineWidth}-glyph sparklines, ${renderer.capability} renderer`
  );

  const monitor = new Monitor({
    stationId: config.stationId,
    source,
    state,
    renderer,
    screen,
    interval: config.interval,
    logger,
  });

  const controller = new AbortController();
  const abort = () => controller.abort();

  const onKeypress = (_str: string, key: Keypress | undefined) => {
    if (key && (key.name === 'escape' || (key.ctrl && key.name === 'c'))) {
      abort();
    }
  };

  // Raw mode swallows Ctrl+C, so keypresses are handled directly
  const rawMode = renderer.capability === 'rich' && process.stdin.isTTY;
  if (rawMode) {
    readline.emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);
    process.stdin.resume();
    process.stdin.on('keypress', onKeypress);
  }
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    await monitor.run(controller.signal);
  } finally {
    monitor.stop();
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
    if (rawMode) {
      process.stdin.off('keypress', onKeypress);
      process.stdin.setRawMode(false);
      process.stdin.pause();
    }
  }

  console.log(colors.bold(colors.red('\nMonitor stopped. Exiting.')));
}
