// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import {IsBoolean, IsInt, Matches} from 'class-validator';
import {type NodeStat} from '../../../../core/tree/node-stat.js';

const DECIMAL = /^-?\d+$/;

/**
 * Display-only copy of a node's server metadata. Never written back to an ensemble.
 */
@Exclude()
export class TreeEntryStat implements NodeStat {
  @Expose()
  @Matches(DECIMAL)
  public czxid!: string;

  @Expose()
  @Matches(DECIMAL)
  public mzxid!: string;

  @Expose()
  @Matches(DECIMAL)
  public pzxid!: string;

  @Expose()
  @IsInt()
  public ctime!: number;

  @Expose()
  @IsInt()
  public mtime!: number;

  @Expose()
  @IsInt()
  public version!: number;

  @Expose()
  @IsInt()
  public cversion!: number;

  @Expose()
  @IsInt()
  public aversion!: number;

  @Expose()
  @Matches(DECIMAL)
  public ephemeralOwner!: string;

  @Expose()
  @IsInt()
  public dataLength!: number;

  @Expose()
  @IsInt()
  public numChildren!: number;

  @Expose()
  @IsBoolean()
  public ephemeral!: boolean;

  public static of(stat: NodeStat): TreeEntryStat {
    const entryStat = new TreeEntryStat();
    entryStat.czxid = stat.czxid;
    entryStat.mzxid = stat.mzxid;
    entryStat.pzxid = stat.pzxid;
    entryStat.ctime = stat.ctime;
    entryStat.mtime = stat.mtime;
    entryStat.version = stat.version;
    entryStat.cversion = stat.cversion;
    entryStat.aversion = stat.aversion;
    entryStat.ephemeralOwner = stat.ephemeralOwner;
    entryStat.dataLength = stat.dataLength;
    entryStat.numChildren = stat.numChildren;
    entryStat.ephemeral = stat.ephemeral;
    return entryStat;
  }
}
