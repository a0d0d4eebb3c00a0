import readline from "readline";
import { logger } from "../logger";
import { runCommandLine } from "./commands";
import { createInitialSession } from "./session";
import type { RenderOptions } from "../config";
import type { CliContext } from "./types";

/**
 * Console interactive: une commande par ligne.
 * @returns Fonction pour fermer la console
 */
export function attachCli(ctx: CliContext, options?: RenderOptions): () => void {
  const session = createInitialSession(options);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("seg7> ");
  process.stdout.write("Tapez 'help' pour la liste des commandes.\n");
  rl.prompt();

  const onLine = async (line: string): Promise<void> => {
    const keepGoing = await runCommandLine(line, ctx, session);
    if (!keepGoing) {
      rl.close();
      return;
    }
    rl.prompt();
  };

  rl.on("line", (line) => {
    onLine(line).catch((err: unknown) => logger.error("Erreur console:", err));
  });
  rl.on("close", () => {
    Promise.resolve(ctx.onExit?.()).catch((err: unknown) => logger.error("Erreur à la fermeture:", err));
  });
  return () => rl.close();
}
