#!/usr/bin/env node
import { promises as fs } from "fs";
import { logger, setLogLevel } from "./logger";
import { findConfigPath, loadConfig, resolveRenderOptions, watchConfig, type RenderOptions, type Seg7Config } from "./config";
import { parseArgs, USAGE, type CliArgs } from "./cli/args";
import { attachCli } from "./cli";
import { applyArgOverrides } from "./app/options";
import { renderTextToAscii, renderTextToSvg } from "./app/render";

async function emit(text: string, options: RenderOptions, args: CliArgs): Promise<void> {
  if (args.ascii) {
    process.stdout.write(renderTextToAscii(text, options) + "\n");
    return;
  }
  const svg = renderTextToSvg(text, options);
  if (options.outPath) {
    await fs.writeFile(options.outPath, svg, "utf8");
    logger.info(`SVG écrit: ${options.outPath}`);
  } else {
    process.stdout.write(svg);
  }
}

async function main(argv: string[]): Promise<void> {
  const args = parseArgs(argv);
  if (args.logLevel) setLogLevel(args.logLevel);
  if (args.help) {
    process.stdout.write(USAGE);
    return;
  }

  const configPath = await findConfigPath(args.configPath);
  if (args.configPath && configPath !== args.configPath) {
    logger.warn(`Configuration introuvable: ${args.configPath}`);
  }
  let cfg: Seg7Config = {};
  if (configPath) {
    logger.debug(`Chargement configuration: ${configPath}`);
    cfg = await loadConfig(configPath);
  }
  let options = applyArgOverrides(resolveRenderOptions(cfg), args);

  if (args.interactive || args.text.length === 0) {
    attachCli(
      {
        write: (text) => process.stdout.write(text),
        writeFile: (filePath, data) => fs.writeFile(filePath, data, "utf8"),
        onExit: () => process.exit(0),
      },
      options
    );
    return;
  }

  await emit(args.text, options, args);
  if (!args.watch) return;
  if (!configPath) {
    logger.warn("--watch ignoré: aucun fichier de configuration.");
    return;
  }

  logger.info(`Surveillance de ${configPath}…`);
  const stop = watchConfig(
    configPath,
    (next) => {
      try {
        options = applyArgOverrides(resolveRenderOptions(next), args);
      } catch (err) {
        logger.warn("Configuration rechargée invalide:", err);
        return;
      }
      logger.info("Configuration rechargée.");
      emit(args.text, options, args).catch((err: unknown) => logger.error("Erreur de rendu:", err));
    },
    (err) => logger.warn("Erreur hot reload config:", err)
  );

  process.on("SIGINT", () => {
    stop();
    process.exit(0);
  });
}

main(process.argv.slice(2)).catch((err: unknown) => {
  logger.error("Erreur fatale:", err);
  process.exit(1);
});
