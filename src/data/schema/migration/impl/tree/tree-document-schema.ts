// SPDX-License-Identifier: Apache-2.0

import {type Schema} from '../../api/schema.js';
import {TreeDocument} from '../../../model/tree/tree-document.js';
import {type Version} from '../../../../../business/utils/version.js';
import {type ClassConstructor} from '../../../../../business/utils/class-constructor.type.js';
import {type SchemaMigration} from '../../api/schema-migration.js';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../../../../core/dependency-injection/inject-tokens.js';
import {type ObjectMapper} from '../../../../mapper/api/object-mapper.js';
import {SchemaBase} from '../../api/schema-base.js';
import {TreeDocumentV1Migration} from './tree-document-v1-migration.js';
import {patchInject} from '../../../../../core/dependency-injection/container-helper.js';

@injectable()
export class TreeDocumentSchema extends SchemaBase<TreeDocument> implements Schema<TreeDocument> {
  public constructor(@inject(InjectTokens.ObjectMapper) mapper?: ObjectMapper) {
    super(patchInject(mapper, InjectTokens.ObjectMapper, TreeDocumentSchema.name));
  }

  public get name(): string {
    return TreeDocument.name;
  }

  public get version(): Version {
    return TreeDocument.SCHEMA_VERSION;
  }

  public get classCtor(): ClassConstructor<TreeDocument> {
    return TreeDocument;
  }

  public get migrations(): SchemaMigration[] {
    return [new TreeDocumentV1Migration()];
  }
}
