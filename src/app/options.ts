import type { RenderOptions } from "../config";
import type { CliArgs } from "../cli/args";
import { skewFromValue } from "../render/skew";

/** Les options passées en ligne de commande priment sur la configuration. */
export function applyArgOverrides(options: RenderOptions, args: CliArgs): RenderOptions {
  return {
    ...options,
    color: args.color ?? options.color,
    skew: args.skew !== undefined ? skewFromValue(args.skew) : options.skew,
    outPath: args.outPath ?? options.outPath,
  };
}
