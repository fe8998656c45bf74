import { describe, expect, it } from 'vitest'
import { createCandidate } from '../test-support'
import { candidatePicker, escapeMarkdown, formatRouteResult, markdownReply } from './messages'

const link = 'https://www.openstreetmap.org/directions?engine=fossgis_osrm_car&route=1,2;3,4'

describe('Flow Messages', () => {
  describe('escapeMarkdown', () => {
    it('escapes entity markers', () => {
      expect(escapeMarkdown('Quán *Ba* [Lá] `x` _y_')).toBe('Quán \\*Ba\\* \\[Lá] \\`x\\` \\_y\\_')
    })

    it('leaves plain text alone', () => {
      expect(escapeMarkdown('Chợ Bến Thành (cổng Nam)')).toBe('Chợ Bến Thành (cổng Nam)')
    })
  })

  describe('formatRouteResult', () => {
    it('renders base names, rounded distance and minutes', () => {
      const text = formatRouteResult(
        'Chợ Bến Thành — Lê Lợi, P. Bến Thành',
        'Dinh Độc Lập',
        { distanceMeters: 2345, durationSeconds: 389, link }
      )

      expect(text).toBe(
        '✅ *Tuyến đường*\n' +
          'Chợ Bến Thành → Dinh Độc Lập\n\n' +
          '📐 *2.3 km*   ⏱️ *6 phút*\n' +
          `🗺️ [Mở chỉ đường trên OSM](${link})\n\n` +
          '🔁 Gõ /route để tìm tuyến khác hoặc /help'
      )
    })

    it('rounds half a minute up', () => {
      const text = formatRouteResult('A', 'B', { distanceMeters: 0, durationSeconds: 150, link })

      expect(text.split('\n')[3]).toBe('📐 *0.0 km*   ⏱️ *3 phút*')
    })

    it('escapes markdown in place names', () => {
      const text = formatRouteResult('Bar_One — Q.1', 'Cafe *Sao*', {
        distanceMeters: 1000,
        durationSeconds: 60,
        link
      })

      expect(text.split('\n')[1]).toBe('Bar\\_One → Cafe \\*Sao\\*')
    })
  })

  describe('candidatePicker', () => {
    it('puts each candidate on its own row before the re-enter row', () => {
      const reply = candidatePicker(
        'Chọn:',
        [createCandidate({ label: 'A' }), createCandidate({ label: 'B' })],
        'dest'
      )

      expect(reply).toEqual({
        kind: 'reply',
        text: 'Chọn:',
        buttons: [
          [{ label: 'A', token: { kind: 'select_dest', index: 0 } }],
          [{ label: 'B', token: { kind: 'select_dest', index: 1 } }],
          [{ label: 'Nhập lại', token: { kind: 'back_dest' } }]
        ]
      })
    })
  })

  describe('markdownReply', () => {
    it('only sets disablePreview when asked', () => {
      expect(markdownReply('x')).toEqual({ kind: 'reply', text: 'x', format: 'markdown' })
      expect(markdownReply('x', true)).toEqual({
        kind: 'reply',
        text: 'x',
        format: 'markdown',
        disablePreview: true
      })
    })
  })
})
