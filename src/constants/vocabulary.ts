import type { ReportField } from '@/types/report';

/**
 * Header labels seen on the supported instruments' reports, per field.
 * Compared after `normalizeLabel`, so case, spacing, punctuation and
 * bracketed units ("Measured Value (mm)") do not matter.
 */
export const HEADER_VOCABULARY: Record<ReportField, readonly string[]> = {
    index: ['No', 'Index', '#', '序號', '序号'],
    itemName: ['測量專案', '测量项目', 'Item', 'Item Name', 'Feature'],
    measured: ['實測值', '实测值', 'Measured', 'Measured Value', 'Actual'],
    design: ['設計值', '设计值', 'Design', 'Design Value', 'Nominal'],
    upperTolerance: ['上限公差', 'Upper Tol', 'Upper Tolerance', '+Tol'],
    lowerTolerance: ['下限公差', 'Lower Tol', 'Lower Tolerance', '-Tol'],
    usl: ['USL', 'Upper Limit'],
    lsl: ['LSL', 'Lower Limit'],
    unit: ['單位', '单位', 'Unit'],
    judgement: ['判斷', '判断', 'Judge', 'Judgement'],
    timestamp: ['測量時間', 'Time', 'Timestamp'],
};

/** Preamble labels carrying the report-level measurement time. */
export const METADATA_TIMESTAMP_LABELS: readonly string[] = [
    '測量日期及時間',
    '测量日期及时间',
    'Measurement Date',
    'Measured At',
];
