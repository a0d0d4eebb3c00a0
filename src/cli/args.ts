import { isLogLevel, type LogLevel } from "../logger";

/** Arguments de la ligne de commande `seg7`. */
export interface CliArgs {
  text: string;
  configPath?: string;
  outPath?: string;
  color?: string;
  skew?: string;
  logLevel?: LogLevel;
  ascii: boolean;
  watch: boolean;
  interactive: boolean;
  help: boolean;
}

export const USAGE = [
  "Usage: seg7 [options] <texte…>",
  "",
  "  -c, --config <fichier>   configuration YAML (défaut: seg7.yaml, config/seg7.yaml)",
  "  -o, --out <fichier>      écrire le SVG dans un fichier (sinon stdout)",
  "      --color <css>        couleur des segments",
  "      --skew <valeur>      none | traditional | facteur",
  "      --ascii              aperçu texte au lieu du SVG",
  "  -w, --watch              re-générer à chaque modification de la configuration",
  "  -i, --interactive        console interactive",
  "      --log-level <niv>    error | warn | info | debug | trace",
  "  -h, --help               cette aide",
  "",
].join("\n");

const VALUE_OPTIONS: Record<string, "configPath" | "outPath" | "color" | "skew" | "logLevel"> = {
  "-c": "configPath",
  "--config": "configPath",
  "-o": "outPath",
  "--out": "outPath",
  "--color": "color",
  "--skew": "skew",
  "--log-level": "logLevel",
};

/**
 * Analyse argv (sans `node` ni le script). Les arguments positionnels forment le texte,
 * joints par des espaces; `--` termine les options.
 * @throws Erreur sur option inconnue ou valeur manquante
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { text: "", ascii: false, watch: false, interactive: false, help: false };
  const words: string[] = [];
  let optionsDone = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (optionsDone || !arg.startsWith("-") || arg === "-") {
      words.push(arg);
      continue;
    }
    if (arg === "--") { optionsDone = true; continue; }
    switch (arg) {
      case "--ascii": out.ascii = true; continue;
      case "-w": case "--watch": out.watch = true; continue;
      case "-i": case "--interactive": out.interactive = true; continue;
      case "-h": case "--help": out.help = true; continue;
    }
    const key = VALUE_OPTIONS[arg];
    if (!key) throw new Error(`Option inconnue: ${arg}`);
    const value = argv[i + 1];
    if (value === undefined) throw new Error(`Valeur manquante pour ${arg}`);
    i += 1;
    if (key === "logLevel") {
      if (!isLogLevel(value)) throw new Error(`Niveau de log inconnu: ${value}`);
      out.logLevel = value;
    } else {
      out[key] = value;
    }
  }
  out.text = words.join(" ");
  return out;
}
