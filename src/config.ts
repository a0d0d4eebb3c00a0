import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import chokidar from "chokidar";
import { logger } from "./logger";
import type { Size } from "./geometry/types";
import { DIM_OPACITY } from "./render/color";
import { DEFAULT_CHARACTER_SIZE } from "./render/readout";
import { NO_SKEW, skewFromValue, type Skew } from "./render/skew";

/** Apparence d'un afficheur. */
export interface DisplayConfig {
  /** Couleur CSS des segments allumés. Défaut: "#ff2020" */
  color?: string;
  /** Opacité des segments éteints (0..1). Défaut: 0.1 */
  dim_opacity?: number;
  /** Inclinaison: "none", "traditional" ou facteur de cisaillement. Défaut: "none" */
  skew?: string | number;
  /** Largeur d'un caractère. Défaut: 36 */
  width?: number;
  /** Hauteur d'un caractère. Défaut: 64 */
  height?: number;
  /** Réessayer avec la casse inversée si un caractère manque. Défaut: true */
  allow_case_toggle?: boolean;
}

/** Options de sortie SVG. */
export interface OutputConfig {
  /** Couleur de fond (aucun fond si absent) */
  background?: string;
  /** Fichier de sortie par défaut */
  path?: string;
  /** Ne pas dessiner les segments éteints */
  hide_unlit?: boolean;
}

/**
 * Configuration racine (seg7.yaml).
 */
export interface Seg7Config {
  display?: DisplayConfig;
  output?: OutputConfig;
}

/** Options de rendu résolues (valeurs par défaut appliquées). */
export interface RenderOptions {
  color: string;
  dimOpacity: number;
  skew: Skew;
  charSize: Size;
  allowCaseToggle: boolean;
  background?: string;
  hideUnlit: boolean;
  outPath?: string;
}

export const DEFAULT_COLOR = "#ff2020";

const DEFAULT_PATHS = ["seg7.yaml", path.join("config", "seg7.yaml")];

type Obj = Record<string, unknown>;

function isObject(v: unknown): v is Obj {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(root: Obj, key: string): Obj | undefined {
  const v = root[key];
  if (v === undefined || v === null) return undefined;
  if (!isObject(v)) throw new Error(`Configuration invalide: '${key}' doit être un objet`);
  return v;
}

function optional<T>(obj: Obj, key: string, where: string, check: (v: unknown) => v is T, expected: string): T | undefined {
  const v = obj[key];
  if (v === undefined || v === null) return undefined;
  if (!check(v)) throw new Error(`Configuration invalide: '${where}.${key}' doit être ${expected}`);
  return v;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isSkewValue = (v: unknown): v is string | number => isString(v) || isNumber(v);

/**
 * Valide le contenu YAML et construit une configuration typée.
 * Un document vide donne une configuration vide.
 * @throws Erreur si la structure ou le type d'une valeur est incorrect
 */
export function parseConfig(raw: string): Seg7Config {
  const doc: unknown = YAML.parse(raw);
  if (doc === null || doc === undefined) return {};
  if (!isObject(doc)) throw new Error("Configuration invalide: objet YAML attendu à la racine");

  const cfg: Seg7Config = {};
  const d = section(doc, "display");
  if (d) {
    cfg.display = {
      color: optional(d, "color", "display", isString, "une chaîne"),
      dim_opacity: optional(d, "dim_opacity", "display", isNumber, "un nombre"),
      skew: optional(d, "skew", "display", isSkewValue, "none, traditional ou un nombre"),
      width: optional(d, "width", "display", isNumber, "un nombre"),
      height: optional(d, "height", "display", isNumber, "un nombre"),
      allow_case_toggle: optional(d, "allow_case_toggle", "display", isBoolean, "un booléen"),
    };
  }
  const o = section(doc, "output");
  if (o) {
    cfg.output = {
      background: optional(o, "background", "output", isString, "une chaîne"),
      path: optional(o, "path", "output", isString, "une chaîne"),
      hide_unlit: optional(o, "hide_unlit", "output", isBoolean, "un booléen"),
    };
  }
  return cfg;
}

function positiveOr(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  if (value > 0) return value;
  logger.warn(`${name}=${value} ignoré (valeur > 0 attendue), défaut ${fallback}`);
  return fallback;
}

/**
 * Applique les valeurs par défaut et borne les valeurs hors plage.
 * @throws Erreur si l'inclinaison n'est pas reconnue
 */
export function resolveRenderOptions(cfg: Seg7Config = {}): RenderOptions {
  const d = cfg.display ?? {};
  const o = cfg.output ?? {};

  let dimOpacity = d.dim_opacity ?? DIM_OPACITY;
  if (dimOpacity < 0 || dimOpacity > 1) {
    const clamped = Math.max(0, Math.min(1, dimOpacity));
    logger.warn(`display.dim_opacity=${dimOpacity} hors de 0..1, ramené à ${clamped}`);
    dimOpacity = clamped;
  }

  return {
    color: d.color ?? DEFAULT_COLOR,
    dimOpacity,
    skew: d.skew === undefined ? NO_SKEW : skewFromValue(d.skew),
    charSize: {
      width: positiveOr(d.width, DEFAULT_CHARACTER_SIZE.width, "display.width"),
      height: positiveOr(d.height, DEFAULT_CHARACTER_SIZE.height, "display.height"),
    },
    allowCaseToggle: d.allow_case_toggle ?? true,
    background: o.background,
    hideUnlit: o.hide_unlit ?? false,
    outPath: o.path,
  };
}

/**
 * Recherche un fichier de configuration existant parmi les chemins par défaut ou un chemin fourni.
 * @param customPath Chemin explicite à tester en priorité
 * @returns Le chemin trouvé ou null
 */
export async function findConfigPath(customPath?: string): Promise<string | null> {
  const candidates = customPath ? [customPath, ...DEFAULT_PATHS] : DEFAULT_PATHS;
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      logger.trace(`Configuration absente: ${p}`);
    }
  }
  return null;
}

/**
 * Charge et valide le fichier YAML de configuration.
 * @param filePath Chemin explicite; sinon, recherche via {@link findConfigPath}
 * @throws Erreur si aucun fichier n'est trouvé ou si son contenu est invalide
 */
export async function loadConfig(filePath?: string): Promise<Seg7Config> {
  const p = await findConfigPath(filePath);
  if (!p) {
    throw new Error("Aucun fichier de configuration trouvé (seg7.yaml)");
  }
  const raw = await fs.readFile(p, "utf8");
  return parseConfig(raw);
}

/**
 * Observe un fichier de configuration YAML et notifie en cas de modification.
 * @param filePath Chemin du fichier à surveiller
 * @param onChange Callback appelée avec la nouvelle configuration
 * @param onError Callback d'erreur facultative (lecture, YAML ou validation)
 * @returns Fonction pour arrêter l'observation
 */
export function watchConfig(
  filePath: string,
  onChange: (cfg: Seg7Config) => void,
  onError?: (err: unknown) => void
): () => void {
  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  const handler = async (): Promise<void> => {
    try {
      const raw = await fs.readFile(filePath, "utf8");
      onChange(parseConfig(raw));
    } catch (err) {
      if (onError) onError(err);
      else logger.warn("Erreur rechargement configuration:", err);
    }
  };
  watcher.on("change", () => {
    void handler();
  });
  return () => {
    watcher.close().catch((err: unknown) => logger.debug("Fermeture du watcher:", err));
  };
}
