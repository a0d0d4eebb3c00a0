/**
 * Contexte fourni par l'application pour brancher la console.
 */
export interface CliContext {
  /** Sortie des résultats (aperçus, SVG) */
  write: (text: string) => void;
  /** Écriture d'un fichier (sauvegarde SVG) */
  writeFile: (filePath: string, data: string) => Promise<void>;
  onExit?: () => Promise<void> | void;
}
