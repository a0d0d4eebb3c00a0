import chalk from "chalk";
import { logger } from "../logger";
import { renderTextToAscii, renderTextToSvg } from "../app/render";
import { describeSkew, skewFromValue } from "../render/skew";
import { readoutStates } from "../render/readout";
import { encodableCharacters } from "../segments/encoding";
import type { CliContext } from "./types";
import type { SessionState } from "./session";

export interface CommandHandlers {
	[name: string]: (args: string[], ctx: CliContext, session: SessionState) => Promise<void> | void;
}

export const HELP_LINES: ReadonlyArray<[string, string]> = [
	["show <texte>", "aperçu texte et masques des caractères"],
	["svg <texte>", "affiche le document SVG"],
	["save <fichier> <texte>", "écrit le SVG dans un fichier"],
	["color <css>", "couleur des segments"],
	["skew <none|traditional|n>", "inclinaison"],
	["size <largeur> <hauteur>", "taille d'un caractère"],
	["period <index…|none>", "points décimaux allumés"],
	["chars", "caractères de la table"],
	["options", "options courantes"],
	["help", "cette aide"],
	["exit", "quitter"],
];

function toHex(mask: number): string {
	return "0x" + mask.toString(16).padStart(2, "0");
}

export const handlers: CommandHandlers = {
	show(rest, ctx, s) {
		const text = rest.join(" ");
		const preview = renderTextToAscii(text, s.options, s.periods);
		ctx.write(chalk.red(preview) + "\n");
		const masks = readoutStates(text, s.options.allowCaseToggle).map(toHex).join(" ");
		ctx.write(`masks: ${masks}\n`);
	},
	svg(rest, ctx, s) {
		ctx.write(renderTextToSvg(rest.join(" "), s.options, s.periods));
	},
	async save(rest, ctx, s) {
		const [file, ...words] = rest;
		if (!file) {
			logger.warn("Usage: save <fichier> <texte>");
			return;
		}
		await ctx.writeFile(file, renderTextToSvg(words.join(" "), s.options, s.periods));
		logger.info(`SVG écrit: ${file}`);
	},
	color(rest, _ctx, s) {
		const color = rest.join(" ").trim();
		if (!color) {
			logger.warn("Usage: color <css>");
			return;
		}
		s.options = { ...s.options, color };
		logger.info(`Couleur: ${color}`);
	},
	skew(rest, _ctx, s) {
		const skew = skewFromValue(rest[0] ?? "none");
		s.options = { ...s.options, skew };
		logger.info(`Inclinaison: ${describeSkew(skew)}`);
	},
	size(rest, _ctx, s) {
		const width = Number(rest[0]);
		const height = Number(rest[1]);
		if (!(width > 0) || !(height > 0)) {
			logger.warn("Usage: size <largeur> <hauteur> (valeurs > 0)");
			return;
		}
		s.options = { ...s.options, charSize: { width, height } };
		logger.info(`Taille caractère: ${width}x${height}`);
	},
	period(rest, _ctx, s) {
		if (rest.length === 0 || rest[0] === "none") {
			s.periods = new Set();
			logger.info("Points décimaux: aucun");
			return;
		}
		const indices = rest.map(Number);
		if (indices.some((n) => !Number.isInteger(n) || n < 0)) {
			logger.warn("Usage: period <index…|none> (entiers >= 0)");
			return;
		}
		s.periods = new Set(indices);
		logger.info(`Points décimaux: ${indices.join(", ")}`);
	},
	chars(_rest, ctx) {
		ctx.write(encodableCharacters().map((c) => (c === " " ? "␠" : c)).join(" ") + "\n");
	},
	options(_rest, ctx, s) {
		const o = s.options;
		ctx.write(
			[
				`color: ${o.color}`,
				`dim_opacity: ${o.dimOpacity}`,
				`skew: ${describeSkew(o.skew)}`,
				`size: ${o.charSize.width}x${o.charSize.height}`,
				`allow_case_toggle: ${o.allowCaseToggle}`,
			].join("\n") + "\n"
		);
	},
	help(_rest, ctx) {
		const width = Math.max(...HELP_LINES.map(([c]) => c.length));
		ctx.write(HELP_LINES.map(([c, d]) => `  ${chalk.bold(c.padEnd(width))}  ${d}`).join("\n") + "\n");
	},
};

/**
 * Exécute une ligne de commande; les erreurs sont journalisées sans interrompre la session.
 * @returns false si la session doit se terminer
 */
export async function runCommandLine(line: string, ctx: CliContext, session: SessionState): Promise<boolean> {
	const [rawCmd, ...rest] = line.trim().split(/\s+/);
	const cmd = rawCmd === "-h" || rawCmd === "--help" ? "help" : rawCmd;
	if (!cmd) return true;
	if (cmd === "exit" || cmd === "quit") return false;
	const handler = Object.prototype.hasOwnProperty.call(handlers, cmd) ? handlers[cmd] : undefined;
	if (!handler) {
		logger.warn(`Commande inconnue: ${cmd}. Tapez 'help'.`);
		return true;
	}
	try {
		await handler(rest, ctx, session);
	} catch (err) {
		logger.error(`Erreur commande '${cmd}':`, err);
	}
	return true;
}
