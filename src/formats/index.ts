import type { FormatWriters } from './types.js';
import { writeBin } from './writeBin.js';
import { writeBitstream } from './writeBitstream.js';
import { writeDump } from './writeDump.js';
import { writeModules } from './writeModules.js';
import { writeParsed } from './writeParsed.js';
import { writePlacement } from './writePlacement.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeBitstream,
  writeBin,
  writeParsed,
  writeDump,
  writeModules,
  writePlacement,
};
