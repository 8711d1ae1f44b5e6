/**
 * BatchSource - resolves an opaque batch locator into parsed contents
 *
 * Implementations return the decoded JSON value without judging its shape;
 * the validator decides what is a usable batch. Failures to read or decode
 * are raised as BatchSourceError.
 */
export abstract class BatchSource {
  abstract fetch(batchLocator: string): Promise<unknown>;
}
