/*
 *  This file is part of CoCalc: Copyright © 2023 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

import getLogger from "../logger";

const L = getLogger("env-to-number").debug;

// parse environment variable and convert to a non-negative integer, with
// fallback if it is missing or could not be parsed
export function envToInt(
  name: string,
  fallback: number,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const value = env[name];
  if (value == null || value === "") {
    return fallback;
  }
  if (!/^\d+$/.test(value.trim())) {
    L(
      `envToInt: could not parse ${name}=${value}, using fallback value ${fallback}`,
    );
    return fallback;
  }
  return parseInt(value, 10);
}
