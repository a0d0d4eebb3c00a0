import rawEncodings from "./encodings.json";
import { fromSegments, type DisplayState } from "./displayState";
import { isSegment, type Segment } from "./segment";

function buildTable(raw: Record<string, readonly string[]>): ReadonlyMap<string, DisplayState> {
  const table = new Map<string, DisplayState>();
  for (const [ch, names] of Object.entries(raw)) {
    if (Array.from(ch).length !== 1) {
      throw new Error(`encodings.json: clé '${ch}' invalide (un seul caractère attendu)`);
    }
    const segments: Segment[] = [];
    for (const name of names) {
      if (!isSegment(name)) {
        throw new Error(`encodings.json: segment inconnu '${name}' pour '${ch}'`);
      }
      segments.push(name);
    }
    table.set(ch, fromSegments(segments));
  }
  return table;
}

/** Table caractère → segments, figée au chargement du module. */
const CHARACTER_ENCODINGS = buildTable(rawEncodings);

/**
 * Inverse la casse d'un caractère (majuscule ↔ minuscule) en ne gardant que le premier
 * point de code du résultat. Les caractères sans casse sont rendus tels quels.
 */
export function toggleCase(character: string): string {
  const lower = character.toLowerCase();
  const upper = character.toUpperCase();
  let toggled = character;
  if (character === lower && character !== upper) toggled = upper;
  else if (character === upper && character !== lower) toggled = lower;
  return Array.from(toggled)[0] ?? character;
}

/**
 * Encode un caractère vers l'état d'afficheur qui lui ressemble le plus.
 * Si le caractère est absent de la table et que `allowCaseToggle` est vrai, une seconde
 * tentative est faite avec la casse inversée.
 * @returns l'état, ou `null` si le caractère n'est pas représentable (à afficher vide)
 */
export function encode(character: string, allowCaseToggle: boolean = true): DisplayState | null {
  const direct = CHARACTER_ENCODINGS.get(character);
  if (direct !== undefined) return direct;
  if (!allowCaseToggle) return null;
  return CHARACTER_ENCODINGS.get(toggleCase(character)) ?? null;
}

export function isRepresentable(character: string, allowCaseToggle: boolean = true): boolean {
  return encode(character, allowCaseToggle) !== null;
}

/** Caractères présents tels quels dans la table. */
export function encodableCharacters(): string[] {
  return Array.from(CHARACTER_ENCODINGS.keys());
}
