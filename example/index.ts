import path from 'path';
import { fileURLToPath } from 'url';
import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { Knowledge } from '../src/Knowledge';
import { LocalConnector } from '../src/connectors/LocalConnector';
import { loadConfig } from '../src/config';

const docsDir = process.env.DOCS_DIR ?? path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

const knowledge = new Knowledge({
    connectors: [new LocalConnector({ docs: docsDir })],
    config: loadConfig(),
});

const app = express();

app.use(express.json());

app.post('/mcp', async (req, res) => {
    const server = new McpServer({
        name: 'knowledge-example',
        version: '0.0.1',
    });

    const abort = new AbortController();
    knowledge.attachToMcpServer(server, {
        credentials: {},
        signal: abort.signal,
    });

    const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined, // Stateless mode
    });

    res.on('close', async () => {
        abort.abort();
        await transport.close();
    });

    await server.connect(transport);

    await transport.handleRequest(req, res, req.body);
});

app.listen(6969, () => {
    console.log('MCP server is running on http://localhost:6969');
});
