import { JsonObject, isJsonObject } from '../types/json'

/**
 * User and developer documentation of one contract, kept as the compiler
 * emitted it.
 */
export class Natspec {
  constructor(
    public readonly userdoc: JsonObject = {},
    public readonly devdoc: JsonObject = {}
  ) {}

  /**
   * Builds a Natspec from untrusted tool output; anything that is not a JSON
   * object becomes an empty bucket.
   */
  static from(userdoc: unknown, devdoc: unknown): Natspec {
    return new Natspec(isJsonObject(userdoc) ? userdoc : {}, isJsonObject(devdoc) ? devdoc : {})
  }

  public export(): { userdoc: JsonObject; devdoc: JsonObject } {
    return { userdoc: this.userdoc, devdoc: this.devdoc }
  }
}
