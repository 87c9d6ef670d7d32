import { GraphAPI } from '../src/api/graph-api.js';

function main(): void {
  const graph = new GraphAPI({ chunkSizeDays: 45 });

  console.log('🚀 Tempochain Example\n');

  console.log('📄 Adding documents...');
  graph.addDocument('contract_001', 'Purchase agreement for equipment with delivery by March', '2024-01-15', {
    type: 'contract',
  });
  graph.addDocument('amendment_001', 'Amendment to the purchase agreement moving the delivery date', '2024-02-10', {
    type: 'amendment',
  });
  graph.addDocument('claim_001', 'Claim regarding defects in the delivered equipment', '2024-03-05', {
    type: 'claim',
  });
  graph.addDocument('response_001', 'Supplier response to the defects claim', '2024-03-20');
  graph.addDocument('settlement_001', 'Settlement agreement resolving the equipment defects dispute', '2024-05-02', {
    type: 'settlement',
  });
  console.log('✅ Documents added\n');

  console.log('🔗 Creating relationships...');
  graph.addRelationship('contract_001', 'amendment_001', 'causal');
  graph.addRelationship('amendment_001', 'claim_001', 'causal');
  graph.addRelationship('claim_001', 'response_001', 'causal');
  graph.addRelationship('response_001', 'settlement_001', 'causal');
  graph.addRelationship('contract_001', 'settlement_001', 'branch', 0.5);
  console.log('✅ Relationships created\n');

  console.log('🔍 Finding path from contract to settlement...');
  const path = graph.findPath('contract_001', 'settlement_001');
  if (path.found) {
    console.log(`Path found (${path.hops} hops):`, path.path.join(' → '));
  }
  console.log('');

  console.log('⏩ Documents reachable from the claim within 30 days...');
  for (const { document, hops } of graph.forwardReachable('claim_001', { timeWindowDays: 30 }).reachable) {
    console.log(`  - ${document.id} (${hops} hop${hops === 1 ? '' : 's'}, ${document.timestamp.toISOString()})`);
  }
  console.log('');

  console.log('🧠 Attention from the claim...');
  const attention = graph.computeAttention('claim_001');
  for (const entry of [...attention.backward, ...attention.forward]) {
    console.log(`  - ${entry.id}: ${entry.score.toFixed(3)} (${entry.distanceDays} days away)`);
  }
  console.log(`  Balance: ${attention.summary.attentionBalance}\n`);

  console.log('📊 Analyzing the dispute window by window...');
  const analysis = graph.analyzeLongChain({
    startDocumentId: 'contract_001',
    endDocumentId: 'settlement_001',
    onChunk: chunk => {
      console.log(
        `  Window ${chunk.index + 1}: ${chunk.newDocumentIds.join(', ') || '(empty)'}` +
          ` | open questions: ${chunk.openQuestions.length}`
      );
    },
  });
  console.log('  Chains:');
  for (const chain of analysis.causalChains) {
    console.log(`    ${chain.join(' → ')}`);
  }
  console.log(`  Estimated speedup: ${analysis.metrics.speedup}x\n`);

  console.log('📈 Statistics:');
  const stats = graph.getStatistics();
  console.log(`  Documents: ${stats.graph.nodeCount}`);
  console.log(`  Relationships: ${stats.graph.edgeCount}`);
  console.log(`  Time span: ${stats.graph.timeSpanDays} days`);

  graph.close();
  console.log('\n✨ Example completed!');
}

main();
