// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type ObjectMapper} from '../../data/mapper/api/object-mapper.js';
import {type Schema} from '../../data/schema/migration/api/schema.js';
import {type TreeDocument} from '../../data/schema/model/tree/tree-document.js';
import {type ObjectStorageBackend} from '../../data/backend/api/object-storage-backend.js';
import {YamlFileStorageBackend} from '../../data/backend/impl/yaml-file-storage-backend.js';
import {JsonFileStorageBackend} from '../../data/backend/impl/json-file-storage-backend.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {TREE_DOCUMENT_YAML_EXTENSIONS} from '../constants.js';

/**
 * Reads and writes tree documents. Files ending in `.yaml` or `.yml` are YAML; anything else is JSON.
 */
@injectable()
export class TreeDocumentFile {
  private readonly mapper: ObjectMapper;
  private readonly schema: Schema<TreeDocument>;

  public constructor(
    @inject(InjectTokens.ObjectMapper) mapper?: ObjectMapper,
    @inject(InjectTokens.TreeDocumentSchema) schema?: Schema<TreeDocument>,
  ) {
    this.mapper = patchInject(mapper, InjectTokens.ObjectMapper, this.constructor.name);
    this.schema = patchInject(schema, InjectTokens.TreeDocumentSchema, this.constructor.name);
  }

  public async read(filePath: string): Promise<TreeDocument> {
    const object = await TreeDocumentFile.backendFor(filePath).readObject(PathEx.basename(filePath));
    return this.schema.transform(object);
  }

  public async write(filePath: string, document: TreeDocument): Promise<void> {
    await TreeDocumentFile.backendFor(filePath).writeObject(PathEx.basename(filePath), this.mapper.toObject(document));
  }

  private static backendFor(filePath: string): ObjectStorageBackend {
    const directory = PathEx.dirname(PathEx.resolve(filePath));
    return TREE_DOCUMENT_YAML_EXTENSIONS.includes(PathEx.extname(filePath))
      ? new YamlFileStorageBackend(directory)
      : new JsonFileStorageBackend(directory);
  }
}
