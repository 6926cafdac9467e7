import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export type { FormatOptions, IFormatter, OutputFormat, PlanReport } from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export { describeOperation, describeLocation } from './describe.js';

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  return format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
