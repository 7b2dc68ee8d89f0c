/**
 * Rope demo - build, concatenate, uncons
 */

import {
  ropeConcat,
  ropeFromText,
  ropeMeasure,
  ropeToText,
  ropeUncons,
  seqConcat,
  type Rope,
} from '../packages/core/src/index';

function report(label: string, rope: Rope): void {
  console.log(`\n${label}`);
  console.log('Text:', JSON.stringify(ropeToText(rope)));
  console.log('Measure:', ropeMeasure(rope));

  const res = ropeUncons(rope);
  if (!res) {
    console.log('Uncons: none');
    return;
  }
  const [first, rest] = res;
  console.log('Uncons:', JSON.stringify(first.text), first);
  console.log('Remainder measure:', ropeMeasure(rest));
}

console.log('=== seqtree: Rope ===');

const hello = ropeFromText('Hello');
const world = ropeFromText(', world!!');

// Tree concatenation keeps both chunks
report('1️⃣ seqConcat (chunks kept)', seqConcat(hello, world));

// Rope concatenation merges the chunks meeting at the junction
report('2️⃣ ropeConcat (chunks merged)', ropeConcat(hello, world));

report('3️⃣ empty rope', ropeFromText(''));
