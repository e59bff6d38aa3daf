/**
 * IDocSource - resolver of a WIT source tree into documentation
 *
 * @module
 */

import type { DocTree } from "../docs/doc-tree.js";

/**
 * Documentation resolved from one WIT package
 */
export interface PackageDocs {
  /** Package identifier, e.g. "example:app@0.1.0" */
  packageId: string;
  tree: DocTree;
}

/**
 * Turns a WIT package directory into the doc tree embedded by the injector.
 */
export interface IDocSource {
  /**
   * Resolve the package in `witDir`
   * @throws IOError when the directory or its files cannot be read
   * @throws ParseError when the sources do not declare a package
   */
  read(witDir: string): Promise<PackageDocs>;
}
