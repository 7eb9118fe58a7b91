/**
 * SSKR Examples
 *
 * Splits a phrase across groups, recovers it from a subset, and shows what
 * happens when a group falls short.
 */

import { Sskr, SskrError, createSplitSpec } from '../src/index.js';

const PHRASE =
  'abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about';

// =============================================================================
// Example 1: Two groups, both required
// =============================================================================

function twoGroupExample() {
  console.log('\n=== Example 1: 2 of [2-of-3, 3-of-5] ===\n');

  const spec = createSplitSpec(2, [[2, 3], [3, 5]]);
  const { groups } = Sskr.splitMnemonic(PHRASE, spec);

  groups.forEach((shares, i) => {
    console.log(`Group ${i + 1}:`);
    shares.forEach(share => console.log(`  ${share}`));
  });

  const recovered = Sskr.recoverMnemonic([
    groups[0][0], groups[0][2],
    groups[1][1], groups[1][3], groups[1][4],
  ]);
  console.log(`\nRecovered: ${recovered.mnemonic}`);
  console.log(`Matches:   ${recovered.mnemonic === PHRASE}`);
}

// =============================================================================
// Example 2: Minimal Bytewords
// =============================================================================

function minimalExample() {
  console.log('\n=== Example 2: 1 of [2-of-3], minimal style ===\n');

  const { mnemonic, groups } = Sskr.splitRandomMnemonic(createSplitSpec(1, [[2, 3]]), {
    style: 'minimal',
    words: 24,
  });

  console.log(`Generated: ${mnemonic}`);
  groups[0].forEach(share => console.log(`  ${share}`));
  console.log(`Recovered: ${Sskr.recoverMnemonic([groups[0][2], groups[0][0]]).mnemonic === mnemonic}`);
}

// =============================================================================
// Example 3: Not enough shares
// =============================================================================

function insufficientExample() {
  console.log('\n=== Example 3: One group short ===\n');

  const { groups } = Sskr.splitMnemonic(PHRASE, createSplitSpec(2, [[2, 3], [3, 5]]));

  try {
    Sskr.recoverMnemonic([groups[0][0], groups[0][1], groups[1][0], groups[1][1]]);
  } catch (error) {
    if (error instanceof SskrError) {
      console.log(`${error.code}: ${error.message}`);
    } else {
      throw error;
    }
  }
}

// =============================================================================
// Run All Examples
// =============================================================================

function main() {
  try {
    twoGroupExample();
    minimalExample();
    insufficientExample();
  } catch (error) {
    console.error('\nError:', error);
    process.exitCode = 1;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main();
}

export { main };
