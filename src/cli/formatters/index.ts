import { CompactFormatter } from './compact.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export * from './types.js';
export { CompactFormatter, HumanFormatter, JsonFormatter };

/**
 * Create the formatter for an output format.
 */
export function createFormatter(options: FormatOptions): IFormatter {
  switch (options.format) {
    case 'json':
      return new JsonFormatter();
    case 'compact':
      return new CompactFormatter();
    case 'human':
      return new HumanFormatter(options);
  }
}
