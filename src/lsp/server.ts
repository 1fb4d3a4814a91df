// src/lsp/server.ts
//
// Lox Language Server (LSP)
// -------------------------
// Stdio server for .lox documents:
// - Diagnostics (scanner + parser + runtime, plus the trailing-token warning)
// - Hover (token info and expression value)
//
// Settings come from lox.config.json next to the document. Log lines go to the
// connection console.
//
// Exports:
//   - startServer()
//   - toLspDiagnostic / toLspSeverity / buildLspDiagnostics (pure, for tests)
//   - uriToFsPath

import {
  createConnection,
  ProposedFeatures,
  TextDocuments,
  TextDocumentSyncKind,
  DiagnosticSeverity,
  type Diagnostic as LspDiagnostic,
  type RemoteConsole,
  type Hover,
  type InitializeResult,
} from "vscode-languageserver/node";

import { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";

import type { Diagnostic as CoreDiagnostic } from "../diagnostics/errors";
import { analyzeText, type LoxLanguageResult } from "../language/lox.language";
import { loadLoxConfig, resolveConfig, type LoxConfig } from "../language/configuration";
import { createLogger, type Logger, type LogSink } from "../utils/logger";
import { getHover } from "./hover";

/* =========================================================
   Cache per document
   ========================================================= */

type DocCache = {
  version: number;
  result: LoxLanguageResult;
  config: LoxConfig;
};

/* =========================================================
   Server
   ========================================================= */

export function startServer(): void {
  const connection = createConnection(ProposedFeatures.all, process.stdin, process.stdout);
  const documents = new TextDocuments(TextDocument);
  const cache = new Map<string, DocCache>();
  const log = createLogger({ name: "lox:lsp", level: "info", timestamp: false, sink: consoleSink(connection.console) });

  connection.onInitialize((): InitializeResult => {
    return {
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Incremental,
        hoverProvider: true,
      },
      serverInfo: { name: "lox-language-server" },
    };
  });

  connection.onInitialized(() => {
    log.info("server initialized");
  });

  /* ---------- document lifecycle ---------- */

  documents.onDidClose((e) => {
    cache.delete(e.document.uri);
    connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] }).catch((err: unknown) => {
      log.error(`clearing diagnostics failed for ${e.document.uri}: ${errorMessage(err)}`);
    });
  });

  // fires for open as well as every change
  documents.onDidChangeContent((change) => {
    validateTextDocument(change.document).catch((err: unknown) => {
      log.error(`validate failed for ${change.document.uri}: ${errorMessage(err)}`);
    });
  });

  /* ---------- diagnostics ---------- */

  async function validateTextDocument(doc: TextDocument): Promise<void> {
    const { result, config } = await analyzeWithCache(doc);
    const diagnostics = config.diagnostics.enabled ? buildLspDiagnostics(result.diagnostics, doc, config.diagnostics.maxProblems) : [];
    await connection.sendDiagnostics({ uri: doc.uri, diagnostics });
  }

  /* ---------- hover ---------- */

  connection.onHover(async (params): Promise<Hover | null> => {
    const doc = documents.get(params.textDocument.uri);
    if (!doc) return null;

    const { result, config } = await analyzeWithCache(doc);

    const h = getHover({
      tokens: result.tokens,
      offset: doc.offsetAt(params.position),
      evaluation: result.evaluation,
      showValue: config.hover.evaluate,
    });
    if (!h) return null;

    return {
      contents: { kind: "markdown", value: h.markdown },
      range: { start: doc.positionAt(h.offset), end: doc.positionAt(h.offset + h.length) },
    };
  });

  /* ---------- analysis ---------- */

  async function analyzeWithCache(doc: TextDocument): Promise<DocCache> {
    const existing = cache.get(doc.uri);
    if (existing && existing.version === doc.version) return existing;

    const config = await configFor(doc.uri, log);
    const result = analyzeText(doc.getText(), {
      evaluate: config.hover.evaluate,
      warnTrailingTokens: config.diagnostics.warnTrailingTokens,
    });

    log.debug(`analyzed ${doc.uri} v${doc.version}`, result.timings);

    const entry: DocCache = { version: doc.version, result, config };
    cache.set(doc.uri, entry);
    return entry;
  }

  documents.listen(connection);
  connection.listen();
}

/* =========================================================
   Configuration
   ========================================================= */

async function configFor(uri: string, log: Logger): Promise<LoxConfig> {
  const fsPath = uriToFsPath(uri);
  if (!fsPath) return resolveConfig(null);

  try {
    const config = await loadLoxConfig(fsPath);
    log.setLevel(config.logLevel);
    return config;
  } catch (e: unknown) {
    log.logOnce("warn", `config:${fsPath}`, `config load failed for ${fsPath}: ${errorMessage(e)}`);
    return resolveConfig(null);
  }
}

/** Filesystem path of a file: URI, or null for other schemes (untitled:, etc.). */
export function uriToFsPath(uri: string): string | null {
  const parsed = URI.parse(uri);
  return parsed.scheme === "file" ? parsed.fsPath : null;
}

/* =========================================================
   Converters
   ========================================================= */

export function buildLspDiagnostics(list: readonly CoreDiagnostic[], doc: TextDocument, maxProblems: number): LspDiagnostic[] {
  return list.slice(0, Math.max(0, maxProblems)).map((d) => toLspDiagnostic(d, doc));
}

export function toLspDiagnostic(d: CoreDiagnostic, doc: TextDocument): LspDiagnostic {
  const message = d.where ? `${d.message} (${d.where})` : d.message;

  return {
    severity: toLspSeverity(d.severity),
    // positionAt clamps offsets past the end of the document
    range: { start: doc.positionAt(d.offset), end: doc.positionAt(d.offset + d.length) },
    message,
    code: d.code,
    source: `lox-${d.source}`,
  };
}

export function toLspSeverity(sev: CoreDiagnostic["severity"]): DiagnosticSeverity {
  switch (sev) {
    case "error":
      return DiagnosticSeverity.Error;
    case "warning":
      return DiagnosticSeverity.Warning;
  }
}

/* =========================================================
   Utilities
   ========================================================= */

function consoleSink(console: RemoteConsole): LogSink {
  return {
    error: (msg) => console.error(msg),
    warn: (msg) => console.warn(msg),
    info: (msg) => console.info(msg),
    debug: (msg) => console.log(msg),
  };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
