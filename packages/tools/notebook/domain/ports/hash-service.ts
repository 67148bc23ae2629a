/**
 * Port: HashService
 *
 * Abstracts record identifier hashing so the domain does not depend
 * on a specific crypto implementation.
 */

/** Hashing service for deriving record identifiers from file names */
export interface HashService {
  /**
   * Derive the short identifier of a record file.
   *
   * @param filename - Base name of the file, extension included
   * @returns 10-character lowercase hex string
   */
  fileId(filename: string): Promise<string>;
}
