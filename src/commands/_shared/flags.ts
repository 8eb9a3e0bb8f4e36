import { Flags } from '@oclif/core';

/**
 * Shared flag definitions for consistent CLI experience across commands.
 */
export const SharedFlags = {
  dataDir: Flags.string({
    char: 'D',
    description: 'Directory holding autores.csv and posts.json (default: <install dir>/data)',
  }),

  as: Flags.string({
    char: 'a',
    description: 'Email of the author you are acting as (or set POSTBOOK_AUTHOR)',
  }),

  json: Flags.boolean({
    description: 'Output as JSON',
    default: false,
  }),

  verbose: Flags.boolean({
    description: 'Show data file locations and other details',
    default: false,
  }),

  tags: Flags.string({
    char: 't',
    description: 'Comma-separated tags',
  }),
};
