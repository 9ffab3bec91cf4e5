// SPDX-License-Identifier: Apache-2.0

import {type NodeStat} from './node-stat.js';
import {pathOf, type WalkItem, type WalkSource} from './walk-item.js';
import {ZNodePath} from './znode-path.js';
import {reasonOf} from './retry.js';
import {DEFAULT_PRINT_MAX_DATA_LENGTH} from '../constants.js';

export interface TreePrinterOptions {
  /** longest payload, in bytes, printed in full */
  maxDataLength: number;
}

const INDENT = '  ';
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;

/**
 * Formats walk items as indented text blocks, one per node:
 *
 * ```
 * /app
 *   data: "hello"
 *   stat: version=2 ctime=2024-01-01T00:00:00.000Z mtime=... ephemeral=false dataLength=5 numChildren=1
 * ```
 */
export class TreePrinter {
  private readonly decoder = new TextDecoder('utf-8', {fatal: true});

  public constructor(private readonly options: TreePrinterOptions = {maxDataLength: DEFAULT_PRINT_MAX_DATA_LENGTH}) {}

  public async render(items: WalkSource): Promise<string> {
    const blocks: string[] = [];
    for await (const block of this.blocks(items)) {
      blocks.push(block);
    }
    return blocks.join('\n');
  }

  /** Formats each item as it arrives; indentation is relative to the first item. */
  public async *blocks(items: WalkSource): AsyncGenerator<string> {
    let baseDepth: number | undefined;
    for await (const item of items) {
      baseDepth ??= ZNodePath.depth(pathOf(item));
      yield this.formatItem(item, baseDepth);
    }
  }

  public formatItem(item: WalkItem, baseDepth: number): string {
    const indent = INDENT.repeat(Math.max(0, ZNodePath.depth(pathOf(item)) - baseDepth));
    if (item.kind === 'vanished') {
      return `${indent}${item.path} <vanished>`;
    }
    if (item.kind === 'unreadable') {
      return `${indent}${item.path} <unreadable: ${reasonOf(item.error.cause)}>`;
    }

    const {record} = item;
    return [
      `${indent}${record.path}`,
      `${indent}${INDENT}data: ${this.formatData(record.data)}`,
      `${indent}${INDENT}stat: ${TreePrinter.formatStat(record.metadata)}`,
    ].join('\n');
  }

  public formatData(data: Uint8Array): string {
    if (data.length === 0) {
      return '(empty)';
    }

    const text = this.printableText(data);
    if (text === undefined) {
      return `<binary, ${data.length} bytes>`;
    }
    if (data.length <= this.options.maxDataLength) {
      return JSON.stringify(text);
    }

    const prefix = [...text].slice(0, this.options.maxDataLength).join('');
    return `${JSON.stringify(prefix)} <${data.length} bytes, truncated>`;
  }

  private printableText(data: Uint8Array): string | undefined {
    let text: string;
    try {
      text = this.decoder.decode(data);
    } catch {
      return undefined;
    }
    return CONTROL_CHARACTERS.test(text) ? undefined : text;
  }

  private static formatStat(stat: NodeStat): string {
    return [
      `version=${stat.version}`,
      `ctime=${new Date(stat.ctime).toISOString()}`,
      `mtime=${new Date(stat.mtime).toISOString()}`,
      `ephemeral=${stat.ephemeral}`,
      `dataLength=${stat.dataLength}`,
      `numChildren=${stat.numChildren}`,
    ].join(' ');
  }
}
