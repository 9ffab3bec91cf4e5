// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {before, describe, it} from 'mocha';
import fs from 'node:fs';

import {TreeDocumentFile} from '../../../../src/core/tree/tree-document-file.js';
import {TreeSerializer} from '../../../../src/core/tree/tree-serializer.js';
import {NodeRecord} from '../../../../src/core/tree/node-record.js';
import {NodeStats} from '../../../../src/core/tree/node-stat.js';
import {nodeItems} from '../../../../src/core/tree/walk-item.js';
import {ClassToObjectMapper} from '../../../../src/data/mapper/impl/class-to-object-mapper.js';
import {ConfigKeyFormatter} from '../../../../src/data/key/config-key-formatter.js';
import {TreeDocumentSchema} from '../../../../src/data/schema/migration/impl/tree/tree-document-schema.js';
import {type TreeDocument} from '../../../../src/data/schema/model/tree/tree-document.js';
import {InvalidSchemaVersionError} from '../../../../src/data/schema/migration/api/invalid-schema-version-error.js';
import {MalformedDocumentError} from '../../../../src/core/tree/errors/malformed-document-error.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {getTmpDir} from '../../../test-utility.js';

describe('TreeDocumentFile', () => {
  const mapper = new ClassToObjectMapper(ConfigKeyFormatter.instance());
  const documentFile = new TreeDocumentFile(mapper, new TreeDocumentSchema(mapper));
  const serializer = new TreeSerializer();
  const tempDir = getTmpDir();
  let document: TreeDocument;

  before(async () => {
    const stat = NodeStats.of({
      czxid: '4294967297',
      mzxid: '4294967298',
      pzxid: '4294967299',
      ctime: 1_700_000_000_000,
      mtime: 1_700_000_001_000,
      version: 2,
      cversion: 1,
      aversion: 0,
      ephemeralOwner: '0',
      dataLength: 3,
      numChildren: 1,
    });
    document = await serializer.toDocument(
      nodeItems([
        new NodeRecord('/app', new TextEncoder().encode('cfg'), stat, ['leaf']),
        new NodeRecord('/app/leaf', Uint8Array.from([0xff, 0x00]), NodeStats.unknown(2)),
      ]),
      {exportedAt: new Date(Date.UTC(2024, 5, 1))},
    );
  });

  for (const fileName of ['tree.json', 'tree.yaml', 'tree.yml']) {
    it(`writes and reads back ${fileName}`, async () => {
      const filePath = PathEx.join(tempDir, fileName);

      await documentFile.write(filePath, document);
      const read = await documentFile.read(filePath);

      expect(read.schemaVersion).to.equal(1);
      expect(read.rootPath).to.equal('/app');
      expect(read.exportedAt).to.equal('2024-06-01T00:00:00.000Z');
      expect(read.root.data).to.equal('Y2Zn');
      expect(read.root.stat?.czxid).to.equal('4294967297');
      expect(read.root.stat?.version).to.equal(2);
      expect(read.root.children[0].name).to.equal('leaf');
      expect(read.root.children[0].data).to.equal('/wA=');
      expect([...serializer.fromDocument(read, '/app')].map(record => record.path)).to.deep.equal([
        '/app',
        '/app/leaf',
      ]);
    });
  }

  it('writes JSON for any other extension', async () => {
    const filePath = PathEx.join(tempDir, 'tree.export');

    await documentFile.write(filePath, document);

    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    expect(parsed).to.have.property('rootPath', '/app');
  });

  it('reads a legacy flat export', async () => {
    const filePath = PathEx.join(tempDir, 'legacy.json');
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        '/app/x': {data: null},
        '/app': {data: 'hello', stat: [1, 2, 3, 4, 5, 6, 7, 0, 5, 1, 9]},
      }),
    );

    const read = await documentFile.read(filePath);

    expect(read.schemaVersion).to.equal(1);
    expect(read.rootPath).to.equal('/app');
    expect(read.root.name).to.equal('app');
    expect(read.root.data).to.equal('aGVsbG8=');
    expect(read.root.stat?.czxid).to.equal('1');
    expect(read.root.stat?.pzxid).to.equal('9');
    expect(read.root.stat?.ephemeral).to.be.false;
    expect(read.root.children.map(child => child.name)).to.deep.equal(['x']);
    expect(read.root.children[0].data).to.equal('');
  });

  it('rejects a legacy export whose paths have a gap', async () => {
    const filePath = PathEx.join(tempDir, 'gap.json');
    fs.writeFileSync(filePath, JSON.stringify({'/app': {data: ''}, '/app/a/b': {data: ''}}));

    await expect(documentFile.read(filePath)).to.be.rejectedWith(
      MalformedDocumentError,
      "legacy export is missing the parent of '/app/a/b'",
    );
  });

  it('rejects a document from a newer version', async () => {
    const filePath = PathEx.join(tempDir, 'newer.json');
    fs.writeFileSync(filePath, JSON.stringify({schemaVersion: 2, rootPath: '/', root: {}}));

    await expect(documentFile.read(filePath)).to.be.rejectedWith(
      InvalidSchemaVersionError,
      "Invalid schema version '2'; expected version '1'",
    );
  });

  it('rejects an empty file', async () => {
    const filePath = PathEx.join(tempDir, 'empty.yaml');
    fs.writeFileSync(filePath, '');

    await expect(documentFile.read(filePath)).to.be.rejectedWith('file is empty');
  });
});
