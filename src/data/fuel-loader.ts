import type { EngineGeometry, FuelBlendId, FuelProperties } from '../domain/types';
import { createEngineGeometry, createFuelProperties } from '../domain/parameters';

import e10 from './fuels/e10.json';
import e20 from './fuels/e20.json';
import defaultEngine from './engine.json';

const fuels: Record<FuelBlendId, FuelProperties> = {
  E10: createFuelProperties(e10),
  E20: createFuelProperties(e20),
};

export function getFuel(id: FuelBlendId): FuelProperties {
  return fuels[id];
}

export function getBlendPair(): [FuelProperties, FuelProperties] {
  return [fuels.E10, fuels.E20];
}

export function getDefaultGeometry(): EngineGeometry {
  return createEngineGeometry(defaultEngine);
}
