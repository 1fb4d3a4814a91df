#!/usr/bin/env node
import { startServer } from "../lsp/server";

startServer();
