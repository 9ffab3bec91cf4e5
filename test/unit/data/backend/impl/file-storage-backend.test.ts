// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import fs from 'node:fs';
import {getTmpDir} from '../../../../test-utility.js';
import {FileStorageBackend} from '../../../../../src/data/backend/impl/file-storage-backend.js';
import {JsonFileStorageBackend} from '../../../../../src/data/backend/impl/json-file-storage-backend.js';
import {StorageOperation} from '../../../../../src/data/backend/api/storage-operation.js';
import {StorageBackendError} from '../../../../../src/data/backend/api/storage-backend-error.js';
import {PathEx} from '../../../../../src/business/utils/path-ex.js';

describe('FileStorageBackend', () => {
  it('rejects a base path that does not exist', () => {
    const missing: string = PathEx.join(getTmpDir(), 'missing');
    expect(() => new FileStorageBackend(missing)).to.throw(
      StorageBackendError,
      `basePath must exist and be valid: ${missing}`,
    );
  });

  it('rejects a base path that is a file', () => {
    const file: string = PathEx.join(getTmpDir(), 'file.txt');
    fs.writeFileSync(file, 'x');
    expect(() => new FileStorageBackend(file)).to.throw(StorageBackendError, `basePath must be a valid directory: ${file}`);
  });

  it('lists only the files directly in the base path', async () => {
    const base: string = getTmpDir();
    fs.writeFileSync(PathEx.join(base, 'b.yaml'), 'b');
    fs.writeFileSync(PathEx.join(base, 'a.yaml'), 'a');
    fs.mkdirSync(PathEx.join(base, 'nested'));

    const backend: FileStorageBackend = new FileStorageBackend(base);
    expect((await backend.list()).sort()).to.deep.equal(['a.yaml', 'b.yaml']);
    expect(backend.isSupported(StorageOperation.ReadObject)).to.be.false;
  });

  it('round trips bytes', async () => {
    const backend: FileStorageBackend = new FileStorageBackend(getTmpDir());
    await backend.writeBytes('data.bin', new Uint8Array([0, 1, 255]));
    expect([...(await backend.readBytes('data.bin'))]).to.deep.equal([0, 1, 255]);
  });
});

describe('JsonFileStorageBackend', () => {
  it('writes sorted, indented json', async () => {
    const base: string = getTmpDir();
    const backend: JsonFileStorageBackend = new JsonFileStorageBackend(base);
    await backend.writeObject('tree.json', {b: 1, a: {d: [2], c: 'x'}});

    expect(fs.readFileSync(PathEx.join(base, 'tree.json'), 'utf8')).to.equal(
      '{\n  "a": {\n    "c": "x",\n    "d": [\n      2\n    ]\n  },\n  "b": 1\n}\n',
    );
    expect(await backend.readObject('tree.json')).to.deep.equal({a: {c: 'x', d: [2]}, b: 1});
  });

  it('rejects a json file that is not an object', async () => {
    const base: string = getTmpDir();
    fs.writeFileSync(PathEx.join(base, 'number.json'), '42');
    await expect(new JsonFileStorageBackend(base).readObject('number.json')).to.be.rejectedWith(
      'json file does not contain an object',
    );
  });

  it('rejects malformed json', async () => {
    const base: string = getTmpDir();
    fs.writeFileSync(PathEx.join(base, 'broken.json'), '{"a":');
    await expect(new JsonFileStorageBackend(base).readObject('broken.json')).to.be.rejectedWith(
      'error parsing json file',
    );
  });
});
