import type { LayoutRow, SheetBlock, TabularLayout, TransactionRecord } from '../../types.js';
import { formatAmount } from '../../utils/amount.js';

export const BLOCK_GAP_ROWS = 3;
export const REPORT_COLUMNS = ['date', 'description', 'amount', 'category'] as const;

function transactionRow(tx: TransactionRecord): LayoutRow {
  return { kind: 'transaction', cells: [tx.date, tx.description, formatAmount(tx.amount), tx.category ?? ''] };
}

/**
 * Lays blocks out top to bottom: the file header row directly above its
 * transactions, and exactly three blank rows before every block but the first.
 */
export function compile(groupKey: string, blocks: readonly SheetBlock[]): TabularLayout {
  const rows: LayoutRow[] = [];
  blocks.forEach((block, index) => {
    const gap = index === 0 ? 0 : BLOCK_GAP_ROWS;
    for (let i = 0; i < gap; i += 1) {
      rows.push({ kind: 'blank', cells: [] });
    }
    rows.push({ kind: 'header', cells: [block.headerLabel], highlighted: true });
    rows.push(...block.transactions.map(transactionRow));
  });
  return { groupKey, columns: REPORT_COLUMNS, rows };
}

/** Accumulates blocks per group; groups keep the order they were first seen in. */
export class ReportBook {
  private readonly groups = new Map<string, SheetBlock[]>();

  addBlock(groupKey: string, sourceFilename: string, transactions: TransactionRecord[], headerLabel = sourceFilename): SheetBlock {
    let blocks = this.groups.get(groupKey);
    if (!blocks) {
      blocks = [];
      this.groups.set(groupKey, blocks);
    }
    const block: SheetBlock = {
      groupKey,
      sourceFilename,
      headerLabel,
      transactions,
      separatorRowsBefore: blocks.length === 0 ? 0 : BLOCK_GAP_ROWS,
    };
    blocks.push(block);
    return block;
  }

  get groupKeys(): string[] {
    return [...this.groups.keys()];
  }

  blocksFor(groupKey: string): readonly SheetBlock[] {
    return this.groups.get(groupKey) ?? [];
  }

  layouts(): TabularLayout[] {
    return this.groupKeys.map((groupKey) => compile(groupKey, this.blocksFor(groupKey)));
  }
}
