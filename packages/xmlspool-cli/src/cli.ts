#!/usr/bin/env node
/**
 * xmlspool CLI - renders a JSON document description as XML
 *
 * Reads the description from the input file (stdin when omitted) and
 * writes the document to stdout, or to a file with -o.
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { createXmlSink, FileStream, StdoutStream, type OutputStream } from 'xmlspool-backend-xml';
import { createTraceSink } from 'xmlspool-backend-trace';
import { parseDescription } from './description';
import { renderDescription } from './render';

interface CliOptions {
  backend: string;
  output?: string;
  indent: string;
  omitDeclaration?: boolean;
}

const program = new Command();

program
  .name('xmlspool')
  .description('Render a JSON document description through the streaming XML writer')
  .version('0.1.0')
  .option('-t, --backend <type>', 'Backend type (xml, trace)', 'xml')
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option('--indent <n>', 'Spaces per nesting level, 0 for none', '0')
  .option('--omit-declaration', 'Do not write the XML declaration')
  .argument('[input]', 'JSON description file (default: stdin)')
  .action((inputFile: string | undefined, options: CliOptions) => {
    try {
      const indent = Number(options.indent);
      if (!Number.isInteger(indent) || indent < 0) {
        console.error(`Error: Invalid indentation: ${options.indent}`);
        process.exit(1);
      }

      if (inputFile !== undefined && !fs.existsSync(inputFile)) {
        console.error(`Error: Input file not found: ${inputFile}`);
        process.exit(1);
      }

      // fd 0 is stdin
      const input = fs.readFileSync(inputFile !== undefined ? path.resolve(inputFile) : 0, 'utf-8');
      const description = parseDescription(input);
      const renderOptions = { indent, omitDeclaration: options.omitDeclaration ?? false };

      if (options.backend === 'trace') {
        const sink = createTraceSink();
        renderDescription(description, sink, renderOptions);
        if (options.output !== undefined) {
          fs.writeFileSync(path.resolve(options.output), sink.getOutput() + '\n');
        } else {
          console.log(sink.getOutput());
        }
      } else if (options.backend === 'xml') {
        const stream: OutputStream =
          options.output !== undefined ? openFile(options.output) : new StdoutStream();
        try {
          renderDescription(description, createXmlSink(stream), renderOptions);
          stream.write('\n');
        } finally {
          stream.close();
        }
      } else {
        console.error(`Error: Unknown backend type: ${options.backend}`);
        process.exit(1);
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error('Error:', error.message);
        if (process.env.DEBUG) {
          console.error(error.stack);
        }
      } else {
        console.error('Error:', String(error));
      }
      process.exit(1);
    }
  });

function openFile(file: string): FileStream {
  const stream = new FileStream(path.resolve(file));
  stream.open();
  return stream;
}

program.parse();
