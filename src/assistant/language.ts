import { extname } from "path";

// ── Language detection by file extension ─────────────────

const LANGUAGES: Record<string, string> = {
  ".py": "Python",
  ".js": "JavaScript",
  ".ts": "TypeScript",
  ".java": "Java",
  ".cpp": "C++",
  ".c": "C",
  ".go": "Go",
  ".rs": "Rust",
  ".rb": "Ruby",
  ".php": "PHP",
  ".html": "HTML",
  ".css": "CSS",
  ".sql": "SQL",
  ".md": "Markdown",
  ".sh": "Shell",
  ".json": "JSON",
  ".xml": "XML",
  ".yaml": "YAML",
  ".yml": "YAML",
  ".txt": "Text",
  ".csv": "CSV",
  ".ini": "INI",
  ".cfg": "Config",
  ".toml": "TOML",
};

/** Best guess at a file's language from its extension; "Unknown" otherwise. */
export function detectLanguage(filename: string): string {
  return LANGUAGES[extname(filename).toLowerCase()] ?? "Unknown";
}
