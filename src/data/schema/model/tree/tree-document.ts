// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {IsDefined, IsInt, IsISO8601, IsOptional, IsString, ValidateNested} from 'class-validator';
import {Version} from '../../../../business/utils/version.js';
import {TreeEntry} from './tree-entry.js';

/**
 * Portable export of a subtree. `rootPath` records where the tree was read from; importing places the root entry at
 * whatever path the user names.
 */
@Exclude()
export class TreeDocument {
  public static readonly SCHEMA_VERSION: Version = new Version(1);

  @Expose()
  @IsInt()
  public schemaVersion!: number;

  @Expose()
  @IsString()
  public rootPath!: string;

  @Expose()
  @IsOptional()
  @IsISO8601()
  public exportedAt?: string;

  @Expose()
  @IsDefined()
  @ValidateNested()
  @Type(() => TreeEntry)
  public root!: TreeEntry;

  public static of(rootPath: string, root: TreeEntry, exportedAt?: Date): TreeDocument {
    const document = new TreeDocument();
    document.schemaVersion = TreeDocument.SCHEMA_VERSION.value;
    document.rootPath = rootPath;
    document.exportedAt = exportedAt?.toISOString();
    document.root = root;
    return document;
  }
}
