/**
 * CLI: NextPVR の完了済み録画を1回だけ検証して判定を表示する
 *
 * Usage: npx tsx src/cli/verify.ts [recording-id ...]
 *
 * NEXTPVR_URL 環境変数が必要（Redis は不要）
 */
import dotenv from 'dotenv';
import { MISMATCH_LABEL_TEXT } from '@pvrcheck/common-types';
import {
  closePool,
  createDurationCacheStore,
  createVerificationEngine,
  getCacheConfig,
  getCatalogConfig,
  getVerifierConfig,
  NextPvrCatalogService,
  selectRecordings,
} from '@pvrcheck/verifier';

dotenv.config();

async function main(): Promise<void> {
  const recordingIds = process.argv.slice(2);

  const catalog = new NextPvrCatalogService(getCatalogConfig());
  const { verifier } = createVerificationEngine({
    verifierConfig: getVerifierConfig(),
    catalog,
    cacheStore: await createDurationCacheStore(getCacheConfig()),
  });

  const session = new AbortController();
  process.once('SIGINT', () => session.abort());

  const recordings = selectRecordings(await catalog.listCompletedRecordings(), recordingIds);
  const summary = await verifier.runVerificationPass(recordings, { signal: session.signal });

  console.log('---');
  for (const detail of verifier.listVerdicts()) {
    const name = verifier.getVerification(detail.recordingId)?.getRecording().name ?? detail.recordingId;
    if (detail.verdict.kind === 'verified') {
      console.log(`✅ ${name}`);
    } else {
      const label = detail.label ? ` (${MISMATCH_LABEL_TEXT[detail.label]})` : '';
      console.log(`⚠️ ${name}: expected ${detail.verdict.expected}s, got ${detail.verdict.detected}s${label}`);
    }
  }
  console.log('---');
  console.log(JSON.stringify(summary, null, 2));

  await closePool();
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
