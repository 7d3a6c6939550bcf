#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';

const server = new McpServer({ name: '{{PLUGIN_NAME}}', version: '0.1.0' });

// ─── Tools ───

server.tool(
    'echo',
    'Echo a message back to the caller',
    { message: z.string().describe('Message to echo') },
    async ({ message }) => ({
        content: [{ type: 'text', text: message }],
    })
);

const transport = new StdioServerTransport();
await server.connect(transport);
