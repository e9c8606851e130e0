#!/usr/bin/env node
// MLB MCP server executable.
import { mlbServerDefinition } from '../providers/mlb/mlbTools';
import { runServer } from '../server';

runServer(mlbServerDefinition);
