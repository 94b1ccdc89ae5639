import * as toml from 'toml';

/**
 * A file format secret files can be parsed from.
 */
export interface Format {
  /** The file extension expected for the source file, without the dot. */
  readonly extension: string;
  /** Parse file text into a plain value. Throws on invalid input. */
  parse(text: string): unknown;
}

/** JSON secret files (`*.json`). */
export const jsonFormat: Format = {
  extension: 'json',
  parse(text: string): unknown {
    return JSON.parse(text);
  },
};

/** TOML secret files (`*.toml`). */
export const tomlFormat: Format = {
  extension: 'toml',
  parse(text: string): unknown {
    return toml.parse(text);
  },
};
