// SPDX-License-Identifier: Apache-2.0

/**
 * Write a line to stderr when `condition` holds. Stdout carries only the
 * tree, so it can be piped.
 */
export function log(message: string, condition: boolean): void {
  if (condition) {
    process.stderr.write(`${message}\n`);
  }
}
