/**
 * Flow Messages
 *
 * User-facing Vietnamese text and reply builders for the route conversation.
 */

import { labelBaseName } from '../labels'
import type { Candidate, OutboundReply, ReplyButton, RouteResult } from '../types'

export const INTRO_TEXT =
  '👋 *Xin chào!*\n' +
  'Mình là bot hỗ trợ tìm đường và ước tính thời gian đến (ETA) tại TPHCM.\n\n' +
  '📌 *Cách dùng nhanh:*\n' +
  '- Gõ /route để bắt đầu\n' +
  '- Gõ /help để xem hướng dẫn\n' +
  '- Khi đang thao tác, gõ /cancel để hủy'

export const HELP_TEXT =
  '📖 *Hướng dẫn sử dụng*\n' +
  '  1. Gõ /route để bắt đầu\n' +
  '  2. Nhập điểm đi bằng chữ (ví dụ: tên địa điểm, số nhà,…)\n' +
  '  3. Chọn điểm đi từ danh sách gợi ý\n' +
  '  4. Nhập điểm đến và chọn điểm đến\n' +
  '  5. Chọn phương tiện (hiện tại: Ô tô) và nhận kết quả\n\n' +
  ' *Ghi chú:*\n' +
  '- ETA là thời gian ước tính dựa trên hệ thống định tuyến (OSRM)\n' +
  '- Gõ /cancel để hủy thao tác bất kỳ lúc nào'

export const TEXT = {
  routeStart: 'Bắt đầu tìm đường.\nBạn đi từ đâu? (Nhập địa điểm xuất phát bằng chữ)',
  alreadyInFlow: 'Bạn đang tìm đường dở. Gõ /cancel để hủy trước khi bắt đầu lại.',
  cancelled: 'Đã hủy. Gõ /route để bắt đầu lại.',
  notFound:
    'Không tìm thấy địa điểm. ' +
    'Bạn nhập rõ hơn nhé (VD: tên địa điểm, số nhà, đường, phường, quận, TP.HCM).',
  pickOrigin: 'Mình tìm thấy các địa điểm sau. Bạn chọn đúng điểm xuất phát:',
  pickDest: 'Mình tìm thấy các địa điểm sau. Bạn chọn đúng điểm đến:',
  reenter: 'Nhập lại',
  askOrigin: 'Bạn đi từ đâu? (Nhập địa điểm xuất phát)',
  askDest: 'Bạn muốn đến đâu? (Nhập địa điểm đích)',
  askDestAgain: 'Bạn muốn đến đâu? (Nhập địa điểm đến)',
  reenterOrigin: '↩️ Ok, bạn nhập lại điểm xuất phát nhé.',
  reenterDest: '↩️ Ok, bạn nhập lại điểm đến nhé.',
  chooseMode: '🚦 Chọn phương tiện (bản demo hiện chỉ hỗ trợ Ô tô):',
  modeCar: '🚗 Ô tô',
  modeSkip: '⏭️ Bỏ qua (mặc định Ô tô)',
  modeConfirmed: 'Đã chọn phương tiện: 🚗',
  modeSkipped: 'Bỏ qua chọn phương tiện (mặc định 🚗)',
  routeFailed:
    'Xin lỗi, mình không tính được lộ trình lúc này (OSRM lỗi/không có tuyến). ' +
    'Bạn thử lại với /route nhé.',
  originTextOnly: 'Mình chỉ nhận địa điểm dạng chữ. Bạn nhập điểm xuất phát bằng text nhé.',
  destTextOnly: 'Mình chỉ nhận địa điểm dạng chữ. Bạn nhập điểm đến bằng text nhé.',
  useButtons: 'Vui lòng bấm chọn một địa điểm bên dưới hoặc bấm ‘Nhập lại’.',
  useModeButtons: 'Vui lòng bấm chọn ‘Ô tô’ hoặc ‘Bỏ qua’.',
  invalidNotice: 'Lựa chọn không hợp lệ',
  invalidChoice: 'Lựa chọn không hợp lệ. Bạn chọn lại trong danh sách bên trên nhé.'
} as const

export function originChosenText(label: string): string {
  return `📍 Đã chọn điểm xuất phát: ${label}`
}

export function destChosenText(label: string): string {
  return `📍 Đã chọn điểm đến: ${label}`
}

/**
 * Escape the characters that open an entity in Telegram's legacy Markdown.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, (ch) => `\\${ch}`)
}

export function reply(text: string): OutboundReply {
  return { kind: 'reply', text }
}

export function markdownReply(text: string, disablePreview = false): OutboundReply {
  return disablePreview
    ? { kind: 'reply', text, format: 'markdown', disablePreview }
    : { kind: 'reply', text, format: 'markdown' }
}

/**
 * One button per candidate row, then a re-enter button.
 */
export function candidatePicker(
  text: string,
  candidates: readonly Candidate[],
  role: 'origin' | 'dest'
): OutboundReply {
  const rows = candidates.map((candidate, index): ReplyButton[] => [
    {
      label: candidate.label,
      token: role === 'origin' ? { kind: 'select_origin', index } : { kind: 'select_dest', index }
    }
  ])
  rows.push([
    { label: TEXT.reenter, token: role === 'origin' ? { kind: 'back_origin' } : { kind: 'back_dest' } }
  ])
  return { kind: 'reply', text, buttons: rows }
}

export function modePicker(): OutboundReply {
  return {
    kind: 'reply',
    text: TEXT.chooseMode,
    buttons: [
      [
        { label: TEXT.modeCar, token: { kind: 'mode_confirm' } },
        { label: TEXT.modeSkip, token: { kind: 'mode_skip' } }
      ]
    ]
  }
}

/**
 * Markdown summary of a computed route.
 */
export function formatRouteResult(
  originLabel: string,
  destLabel: string,
  result: RouteResult
): string {
  const from = escapeMarkdown(labelBaseName(originLabel))
  const to = escapeMarkdown(labelBaseName(destLabel))
  const km = (result.distanceMeters / 1000).toFixed(1)
  const minutes = Math.round(result.durationSeconds / 60)

  return (
    '✅ *Tuyến đường*\n' +
    `${from} → ${to}\n\n` +
    `📐 *${km} km*   ⏱️ *${minutes} phút*\n` +
    `🗺️ [Mở chỉ đường trên OSM](${result.link})\n\n` +
    '🔁 Gõ /route để tìm tuyến khác hoặc /help'
  )
}
