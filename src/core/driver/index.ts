export {
  runSections,
  createSectionTransforms,
  resolveUnitFiles,
  resolveOutputPath,
  type DriverOptions,
  type UnitResult,
} from './driver.js';
