import type { Dataset } from "../types/index.js";
import { createDataset } from "./frame.js";

export function sampleDataset(): Dataset {
  return createDataset([
    { open: 100, high: 108, low: 98, close: 105, volume: 1000 },
    { open: 105, high: 112, low: 103, close: 110, volume: 1200 },
    { open: 110, high: 115, low: 107, close: 108, volume: 900 },
    { open: 108, high: 110, low: 105, close: 112, volume: 1500 },
    { open: 112, high: 118, low: 109, close: 115, volume: 1100 },
  ]);
}
