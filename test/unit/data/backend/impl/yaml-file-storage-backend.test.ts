// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import fs from 'node:fs';
import {getTmpDir} from '../../../../test-utility.js';
import {YamlFileStorageBackend} from '../../../../../src/data/backend/impl/yaml-file-storage-backend.js';
import {PathEx} from '../../../../../src/business/utils/path-ex.js';

describe('YAML File Storage Backend', () => {
  const testName: string = 'yaml-file-storage-backend';
  const tempDir: string = getTmpDir();

  it('test readObject and writeObject', async () => {
    const key: string = `${testName}-file.yaml`;
    const backend: YamlFileStorageBackend = new YamlFileStorageBackend(tempDir);
    await backend.writeObject(key, {retry: {maxAttempts: 5}, ensembles: {prod: 'zk1:2181'}});
    expect(fs.readFileSync(PathEx.join(tempDir, key), 'utf8')).to.equal(
      'ensembles:\n  prod: zk1:2181\nretry:\n  maxAttempts: 5\n',
    );
    expect(await backend.readObject(key)).to.deep.equal({ensembles: {prod: 'zk1:2181'}, retry: {maxAttempts: 5}});
  });

  it('test readObject with empty file', async () => {
    const key: string = `${testName}-file2.yaml`;
    fs.writeFileSync(PathEx.join(tempDir, key), '');
    const backend: YamlFileStorageBackend = new YamlFileStorageBackend(tempDir);
    await expect(backend.readObject(key)).to.be.rejectedWith('file is empty');
  });

  it('test readObject with invalid yaml file', async () => {
    const key: string = `${testName}-file3.yaml`;
    fs.writeFileSync(PathEx.join(tempDir, key), 'ensembles: {{ alias }} ensemble {{ connect }}');
    const backend: YamlFileStorageBackend = new YamlFileStorageBackend(tempDir);
    await expect(backend.readObject(key)).to.be.rejectedWith('error parsing yaml file');
  });

  it('test readObject with a scalar document', async () => {
    const key: string = `${testName}-file4.yaml`;
    fs.writeFileSync(PathEx.join(tempDir, key), 'just a string\n');
    const backend: YamlFileStorageBackend = new YamlFileStorageBackend(tempDir);
    await expect(backend.readObject(key)).to.be.rejectedWith('yaml file does not contain a mapping');
  });

  it('test writeObject with invalid key', async () => {
    const backend: YamlFileStorageBackend = new YamlFileStorageBackend(tempDir);
    await expect(backend.writeObject('', {key: 'value'})).to.be.rejectedWith(
      'key must not be null, undefined or empty',
    );
  });
});
