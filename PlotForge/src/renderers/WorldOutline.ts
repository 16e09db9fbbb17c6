import fs from 'fs';
import path from 'path';
import * as echarts from 'echarts';

export const WORLD_MAP_NAME = 'world';

const OUTLINE_PATH = path.join(__dirname, '../../data/world-outline.json');

let registered = false;

/**
 * Coarse land outline (GeoJSON, lon/lat degrees) bundled with the package.
 * Registered with ECharts once per process; the map is read-only afterwards.
 */
export class WorldOutline {
  public static EnsureRegistered(): void {
    if (registered) return;
    const geoJson = fs.readFileSync(OUTLINE_PATH, 'utf8');
    echarts.registerMap(WORLD_MAP_NAME, geoJson);
    registered = true;
  }
}
