/**
 * 出力フォーマットユーティリティ
 */

import type {
  GetAtomResponse,
  GetResidueResponse,
  GetSectionsResponse,
  GetStatusResponse,
  HighlightResult,
  LoadResponse,
  QueryAtomsResponse,
  SelectionResult,
  SystemTable,
  TableValue,
} from '@parmlens/types';

export type OutputFormat = 'text' | 'json';

/**
 * 任意のレスポンスをJSON形式で出力
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatLoadResult(response: LoadResponse): string {
  const lines = [
    `読み込み完了: ${response.path}（${response.took}ms）`,
    `  原子数: ${response.natoms}`,
    `  残基数: ${response.nresidues}`,
    `  セクション数: ${response.nsections}`,
    `  座標: ${response.hasCoordinates ? 'あり' : 'なし'}`,
  ];
  if (response.warnings.length > 0) {
    lines.push(`  警告: ${response.warnings.length}件`);
    for (const warning of response.warnings) {
      lines.push(`    - ${warning}`);
    }
  }
  return lines.join('\n');
}

export function formatSections(response: GetSectionsResponse): string {
  return response.sections
    .map((section) => {
      const layout = section.count > 0 ? `${section.count}x${section.width}` : '-';
      const deprecated = section.deprecated ? ' (deprecated)' : '';
      return (
        `${section.name.padEnd(28)} ${`${section.line + 1}-${section.endLine + 1}`.padEnd(12)} ` +
        `${layout.padEnd(8)} ${String(section.tokenCount).padStart(8)}${deprecated}`
      );
    })
    .join('\n');
}

function formatCell(value: TableValue): string {
  if (value === null) return '-';
  if (typeof value === 'number' && !Number.isInteger(value)) {
    return String(Number(value.toPrecision(6)));
  }
  return String(value);
}

/**
 * 派生テーブルを桁揃えしたテキストに変換（先頭列は行番号）
 */
export function formatTable(table: SystemTable): string {
  const header = ['#', ...table.columns];
  const body = table.rows.map((row, index) => [String(index), ...row.map(formatCell)]);
  const widths = header.map((cell, column) =>
    Math.max(cell.length, ...body.map((row) => (row[column] ?? '').length))
  );
  const render = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column]))
      .join('  ')
      .trimEnd();
  return [render(header), ...body.map(render)].join('\n');
}

export function formatHighlight(result: HighlightResult): string {
  const lines = [`ハイライト: ${result.highlights.length}件`];
  for (const span of result.highlights) {
    lines.push(`  ${span.section} ${span.line + 1}:${span.start}-${span.end}`);
  }
  if (result.interaction) {
    lines.push('');
    lines.push(`相互作用 (${result.interaction.mode}):`);
    lines.push(formatJson(result.interaction));
  }
  return lines.join('\n');
}

export function formatSelection(result: SelectionResult): string {
  return `${result.mode} [${result.index + 1}/${result.total}]: ${result.serials.join(', ')}`;
}

export function formatQueryResult(response: QueryAtomsResponse): string {
  const suffix = response.truncated ? '（上限で打ち切り）' : '';
  if (response.count === 0) {
    return '該当する原子: 0件';
  }
  return `該当する原子: ${response.count}件${suffix}\n${response.serials.join(' ')}`;
}

export function formatAtom(response: GetAtomResponse): string {
  const { atom } = response;
  const charge = atom.parm7.charge === null ? '-' : atom.parm7.charge.toFixed(4);
  return [
    `原子 ${atom.serial}: ${atom.atomName} (${atom.element ?? '?'})`,
    `  残基: ${atom.residue.resname} ${atom.residue.resid}`,
    `  タイプ: ${atom.parm7.atomType} (#${atom.parm7.atomTypeIndex})`,
    `  電荷: ${charge}`,
    `  質量: ${atom.parm7.mass}`,
    `  座標: ${atom.coords.x.toFixed(3)}, ${atom.coords.y.toFixed(3)}, ${atom.coords.z.toFixed(3)}`,
    `  ハイライト: ${response.highlights.length}件`,
  ].join('\n');
}

export function formatResidue(response: GetResidueResponse): string {
  return `残基 ${response.resname} ${response.resid}: ${response.serials.join(', ')}`;
}

export function formatStatus(status: GetStatusResponse): string {
  const { server, model } = status;
  const lines = [
    'Server Status: Running',
    `  Version: ${server.version}`,
    `  PID: ${server.pid}`,
    `  Uptime: ${Math.floor(server.uptime / 1000)}s`,
    `  Requests: ${server.requests.total}`,
  ];
  if (model.loaded) {
    lines.push(`  Topology: ${model.path ?? '-'} (${model.natoms} atoms)`);
    lines.push(`  Tables: ${model.tablesReady ? 'ready' : 'pending'}`);
    lines.push(`  Selection index: ${model.selectionReady ? 'ready' : 'pending'}`);
  } else {
    lines.push('  Topology: not loaded');
  }
  return lines.join('\n');
}
