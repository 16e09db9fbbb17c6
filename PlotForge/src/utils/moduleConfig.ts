import path from 'path';
import type { IConfig } from 'config';
import { z } from 'zod';

let cachedConfig: IConfig | null = null;

/**
 * Package-local settings from PlotForge/config, loaded once. `NODE_CONFIG_DIR` points
 * there only while `config` is first required; `NODE_ENV` picks the overlay file
 * (e.g. test.json) on top of default.json.
 */
export function loadModuleConfig(): IConfig {
  if (cachedConfig) return cachedConfig;
  const oldConfigDir = process.env.NODE_CONFIG_DIR;
  process.env.NODE_CONFIG_DIR = path.join(__dirname, '../../config');
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  const moduleConfig: IConfig = require('config');
  if (oldConfigDir === undefined) {
    delete process.env.NODE_CONFIG_DIR;
  } else {
    process.env.NODE_CONFIG_DIR = oldConfigDir;
  }
  cachedConfig = moduleConfig;
  return cachedConfig;
}

const RenderSettingsSchema = z.object({
  widthInches: z.number().positive(),
  heightInches: z.number().positive(),
  dpi: z.number().int().positive(),
  backgroundColor: z.string().min(1),
  fontFamily: z.string().min(1),
});

export type RenderSettings = z.infer<typeof RenderSettingsSchema>;

/** Figure size and raster resolution used for every encoded chart. */
export function getRenderSettings(): RenderSettings {
  return RenderSettingsSchema.parse(loadModuleConfig().get<unknown>('render'));
}

export function getConfiguredLogLevel(): string {
  const config = loadModuleConfig();
  return config.has('logging.level') ? String(config.get<unknown>('logging.level')) : 'INFO';
}

export function getServerBodyLimit(): string {
  const config = loadModuleConfig();
  return config.has('server.bodyLimit') ? String(config.get<unknown>('server.bodyLimit')) : '5mb';
}
