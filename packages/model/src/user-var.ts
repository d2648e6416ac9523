import type { UserVarEntry } from "@zkgmeta/types";

// NAME [default value] "description"
const ENTRY_PATTERN = /^\s*(\w+)\s+\[([^\]]*)\]\s+"([^"]*)"/;

/**
 * A variable a package asks the user for at install time, e.g. the path to a
 * third-party library.
 */
export class UserVar {
  constructor(
    readonly name: string,
    readonly value?: string,
    readonly description?: string,
  ) {}

  toEntry(): UserVarEntry {
    const entry: UserVarEntry = { name: this.name };
    if (this.value !== undefined) {
      entry.value = this.value;
    }
    if (this.description !== undefined) {
      entry.description = this.description;
    }
    return entry;
  }

  /**
   * Parses the text of a `user_vars` field.
   * Blank text yields an empty list, anything unparseable yields null.
   */
  static parseField(text: string): UserVar[] | null {
    const vars: UserVar[] = [];
    let rest = text.trim();

    while (rest.length > 0) {
      const match = ENTRY_PATTERN.exec(rest);
      if (match === null) {
        return null;
      }

      const [entry, name, value, description] = match;
      if (name === undefined || value === undefined || description === undefined) {
        return null;
      }

      vars.push(new UserVar(name, value, description));
      rest = rest.slice(entry.length).trimStart();
    }

    return vars;
  }

  /** Parses a `NAME=value` override as given on a command line. */
  static parseArg(arg: string): UserVar | null {
    const separator = arg.indexOf("=");
    if (separator <= 0) {
      return null;
    }

    return new UserVar(arg.slice(0, separator), arg.slice(separator + 1));
  }
}
