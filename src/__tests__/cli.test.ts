import * as fs from 'fs';
import * as path from 'path';

import { main, USAGE } from '../cli';
import { createTempDir, flowLogLine, removeTempDir, writeFlowLog, writeTestFile } from '../ingestion/__tests__/helpers';

describe('cli main', () => {
  let tempDir: string;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  const env = { FLOW_EXECUTOR: 'inline', FLOW_PROGRESS_INTERVAL: '0' };

  beforeEach(async () => {
    tempDir = await createTempDir();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    await removeTempDir(tempDir);
  });

  it('should print usage and return 1 for the wrong number of arguments', async () => {
    expect(await main(['only-one'], env)).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(USAGE);
  });

  it('should write the report and return 0', async () => {
    const flowLogPath = await writeFlowLog(tempDir, 'flow.log', [flowLogLine('25', '6')]);
    const lookupPath = await writeTestFile(tempDir, 'lookup.csv', 'dstport,protocol,tag\n25,tcp,sv_P1\n');
    const outputPath = path.join(tempDir, 'out.txt');

    expect(await main([flowLogPath, lookupPath, outputPath], env)).toBe(0);

    expect(await fs.promises.readFile(outputPath, 'ascii')).toBe(
      'Tag Counts:\nTag,Count\nsv_P1,1\n\nPort/Protocol Combination Counts:\nPort,Protocol,Count\n25,tcp,1\n'
    );
    const lastMessage = String(logSpy.mock.calls[logSpy.mock.calls.length - 1][0]);
    expect(lastMessage).toMatch(
      new RegExp(`^✅ Processing complete\\. Output written to '.*out\\.txt'\\. Time taken: \\d+\\.\\d{2} seconds\\.$`)
    );
  });

  it('should report a missing flow log and return 1', async () => {
    const lookupPath = await writeTestFile(tempDir, 'lookup.csv', 'dstport,protocol,tag\n');
    const missing = path.join(tempDir, 'missing.log');

    expect(await main([missing, lookupPath, path.join(tempDir, 'out.txt')], env)).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(`❌ Error: Flow log file '${missing}' does not exist.`);
  });

  it('should report an invalid environment setting and return 1', async () => {
    const flowLogPath = await writeFlowLog(tempDir, 'flow.log', []);
    const lookupPath = await writeTestFile(tempDir, 'lookup.csv', 'dstport,protocol,tag\n');

    expect(await main([flowLogPath, lookupPath, path.join(tempDir, 'out.txt')], { FLOW_WORKERS: 'many' })).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("❌ Error: FLOW_WORKERS must be an integer, got 'many'");
  });
});
