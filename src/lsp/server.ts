// src/lsp/server.ts
//
// Glint Language Server (LSP)
// ---------------------------
// Runs in its own Node.js process (`--stdio`, `--node-ipc` or `--socket`).
// Provides:
// - Diagnostics (lexer + parser + checker + lint)
// - Completions
// - Hover
// - Document symbols
//
// Settings come from the client (`glint.*`) and, when enabled, from the
// nearest glint.config.json, which wins over the client for the fields it
// sets.

import {
  createConnection,
  ProposedFeatures,
  TextDocuments,
  TextDocumentSyncKind,
  type CompletionItem,
  type DocumentSymbol,
  type Hover,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";

import { analyzeText, type AnalysisResult, type CompileOptions } from "../language/compile";
import { loadGlintConfig, type ResolvedGlintConfig } from "../language/configuration";
import { createLogger, type Logger } from "../utils/logger";
import { getCompletions } from "./completion";
import { toDocumentSymbol, toLspCompletionItem, toLspDiagnostics } from "./convert";
import { getHover } from "./hover";
import { getDocumentSymbols } from "./symbols";

/* =========================================================
   Connection & Documents
   ========================================================= */

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

const log: Logger = createLogger({
  name: "glint-lsp",
  level: "info",
  timestamp: false,
  sink: {
    error: (m) => connection.console.error(m),
    warn: (m) => connection.console.warn(m),
    info: (m) => connection.console.info(m),
    debug: (m) => connection.console.log(m),
  },
});

/* =========================================================
   Settings
   ========================================================= */

type ServerSettings = {
  maxNumberOfProblems: number;
  diagnosticsEnabled: boolean;
  lintEnabled: boolean;
  /** Load glint.config.json from the project root. */
  useProjectConfig: boolean;
};

const DEFAULT_SETTINGS: ServerSettings = {
  maxNumberOfProblems: 200,
  diagnosticsEnabled: true,
  lintEnabled: true,
  useProjectConfig: true,
};

let globalSettings: ServerSettings = { ...DEFAULT_SETTINGS };
let hasConfigurationCapability = false;

function readSettings(raw: unknown): ServerSettings {
  if (!isObject(raw) || !isObject(raw.glint)) return { ...DEFAULT_SETTINGS };
  const g = raw.glint;
  return {
    maxNumberOfProblems:
      typeof g.maxNumberOfProblems === "number" && g.maxNumberOfProblems >= 0
        ? g.maxNumberOfProblems
        : DEFAULT_SETTINGS.maxNumberOfProblems,
    diagnosticsEnabled: typeof g.diagnosticsEnabled === "boolean" ? g.diagnosticsEnabled : DEFAULT_SETTINGS.diagnosticsEnabled,
    lintEnabled: typeof g.lintEnabled === "boolean" ? g.lintEnabled : DEFAULT_SETTINGS.lintEnabled,
    useProjectConfig: typeof g.useProjectConfig === "boolean" ? g.useProjectConfig : DEFAULT_SETTINGS.useProjectConfig,
  };
}

function isObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/* =========================================================
   Cache per document
   ========================================================= */

type DocCache = {
  version: number;
  result: AnalysisResult;
  config: ResolvedGlintConfig | null;
};

const cache = new Map<string, DocCache>();

/* =========================================================
   Initialize
   ========================================================= */

connection.onInitialize((params: InitializeParams): InitializeResult => {
  hasConfigurationCapability = !!params.capabilities.workspace?.configuration;

  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      completionProvider: {
        resolveProvider: false,
        triggerCharacters: [".", "(", '"'],
      },
      hoverProvider: true,
      documentSymbolProvider: true,
    },
  };
});

/* =========================================================
   Configuration changes
   ========================================================= */

connection.onDidChangeConfiguration(async (change) => {
  globalSettings = hasConfigurationCapability ? readSettings(change.settings) : { ...DEFAULT_SETTINGS };
  cache.clear();

  for (const doc of documents.all()) {
    await validateTextDocument(doc);
  }
});

/* =========================================================
   Document lifecycle
   ========================================================= */

documents.onDidClose((e) => {
  cache.delete(e.document.uri);
  connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] }).catch((err: unknown) => {
    log.warn(`Clearing diagnostics failed: ${err instanceof Error ? err.message : String(err)}`);
  });
});

documents.onDidChangeContent(async (change) => {
  await validateTextDocument(change.document);
});

/* =========================================================
   Diagnostics pipeline
   ========================================================= */

async function validateTextDocument(doc: TextDocument): Promise<void> {
  try {
    const { result, config } = await analyzeWithCache(doc);
    const enabled = globalSettings.diagnosticsEnabled && (config?.diagnostics.enabled ?? true);
    const max = Math.min(globalSettings.maxNumberOfProblems, config?.diagnostics.maxProblems ?? Infinity);

    await connection.sendDiagnostics({
      uri: doc.uri,
      diagnostics: enabled ? toLspDiagnostics(result.diagnostics, max) : [],
    });
  } catch (e) {
    log.error(`validateTextDocument failed: ${e instanceof Error ? e.message : String(e)}`);
    await connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
  }
}

/* =========================================================
   Providers
   ========================================================= */

connection.onCompletion(async (params): Promise<CompletionItem[]> => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return [];

  const { result } = await analyzeWithCache(doc);
  return getCompletions({ source: doc.getText(), offset: doc.offsetAt(params.position), check: result.check }).map(
    toLspCompletionItem
  );
});

connection.onHover(async (params): Promise<Hover | null> => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return null;

  const { result } = await analyzeWithCache(doc);
  const h = getHover({ source: doc.getText(), offset: doc.offsetAt(params.position), check: result.check });
  if (!h) return null;

  return { contents: { kind: "markdown", value: h.markdown } };
});

connection.onDocumentSymbol(async (params): Promise<DocumentSymbol[]> => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return [];

  const { result } = await analyzeWithCache(doc);
  return getDocumentSymbols(result.program).map(toDocumentSymbol);
});

/* =========================================================
   Core analysis + optional project config
   ========================================================= */

async function analyzeWithCache(doc: TextDocument): Promise<DocCache> {
  const existing = cache.get(doc.uri);
  if (existing && existing.version === doc.version) return existing;

  let config: ResolvedGlintConfig | null = null;
  const uri = URI.parse(doc.uri);
  if (globalSettings.useProjectConfig && uri.scheme === "file") {
    config = await loadGlintConfig(uri.fsPath, undefined, log);
  }

  const lintOff = !globalSettings.lintEnabled || config?.lint.enabled === false;
  const opts: CompileOptions = {
    filename: uri.path,
    lint: lintOff ? false : (config?.lint ?? true),
    logger: log,
  };

  const entry: DocCache = { version: doc.version, result: analyzeText(doc.getText(), opts), config };
  cache.set(doc.uri, entry);
  return entry;
}

/* =========================================================
   Start
   ========================================================= */

documents.listen(connection);
connection.listen();
log.info("Glint language server started");
