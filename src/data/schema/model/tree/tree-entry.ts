// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {IsArray, IsOptional, IsString, ValidateNested} from 'class-validator';
import {TreeEntryStat} from './tree-entry-stat.js';

/**
 * One node of an exported tree. `name` is relative to the parent entry and `data` is base64 encoded.
 */
@Exclude()
export class TreeEntry {
  @Expose()
  @IsString()
  public name!: string;

  @Expose()
  @IsString()
  public data!: string;

  @Expose()
  @IsOptional()
  @ValidateNested()
  @Type(() => TreeEntryStat)
  public stat?: TreeEntryStat;

  @Expose()
  @IsArray()
  @ValidateNested({each: true})
  @Type(() => TreeEntry)
  public children!: TreeEntry[];

  public static of(name: string, data: string, stat?: TreeEntryStat, children: TreeEntry[] = []): TreeEntry {
    const entry = new TreeEntry();
    entry.name = name;
    entry.data = data;
    entry.stat = stat;
    entry.children = children;
    return entry;
  }
}
