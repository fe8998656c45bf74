import { describe, expect, it } from 'vitest'
import { beautify, buildLabel, labelBaseName, resolveBaseName, UNKNOWN_PLACE } from './index'

describe('Label Builder', () => {
  describe('buildLabel', () => {
    it('uses the first display_name segment when name is empty', () => {
      expect(buildLabel({ name: '', display_name: 'A, B, C', address: {} })).toBe('A')
    })

    it('drops a road that repeats the base name and abbreviates the ward', () => {
      const label = buildLabel({
        name: 'Chợ Bến Thành',
        address: { road: 'Chợ Bến Thành', suburb: 'Phường Bến Thành' }
      })

      expect(label).toBe('Chợ Bến Thành — P. Bến Thành')
    })

    it('composes house number, road, neighbourhood and suburb', () => {
      const label = buildLabel({
        name: 'Nhà sách Nguyễn Văn Cừ',
        display_name: 'Nhà sách Nguyễn Văn Cừ, 40, Đường Nguyễn Huệ, Quận 1',
        address: {
          house_number: '40',
          road: 'Đường Nguyễn Huệ',
          neighbourhood: 'Khu phố 3',
          suburb: 'Phường Sài Gòn',
          city: 'Thành phố Hồ Chí Minh'
        }
      })

      expect(label).toBe('Nhà sách Nguyễn Văn Cừ — 40 Nguyễn Huệ, KP 3, P. Sài Gòn')
    })

    it('uses the house number alone when there is no road', () => {
      expect(buildLabel({ name: 'Tiệm bánh mì', address: { house_number: ' 12A ' } })).toBe(
        'Tiệm bánh mì — 12A'
      )
    })

    it('uses the road alone when there is no house number', () => {
      expect(buildLabel({ name: 'Công viên Tao Đàn', address: { road: 'Trương Định' } })).toBe(
        'Công viên Tao Đàn — Trương Định'
      )
    })

    it('keeps the house number when the duplicate road is dropped', () => {
      expect(buildLabel({ name: 'Lê Lợi', address: { house_number: '5', road: 'Lê Lợi' } })).toBe(
        'Lê Lợi — 5'
      )
    })

    it('only drops the road on an exact match', () => {
      expect(buildLabel({ name: 'Lê Lợi', address: { road: 'lê lợi' } })).toBe('Lê Lợi — lê lợi')
    })

    it('never repeats a duplicate road in the label', () => {
      const label = buildLabel({
        name: 'Hai Bà Trưng',
        address: { road: 'Hai Bà Trưng', suburb: 'Phường Tân Định' }
      })

      expect(label.split('Hai Bà Trưng')).toHaveLength(2)
    })

    it('strips the street prefix from the base name', () => {
      expect(buildLabel({ name: 'Đường Hàm Thủ Thiêm' })).toBe('Hàm Thủ Thiêm')
    })

    it('treats non-string address fields as absent', () => {
      const label = buildLabel({
        name: 'Bưu điện',
        address: { road: 7, suburb: null, neighbourhood: 'Khu phố 2' }
      })

      expect(label).toBe('Bưu điện — KP 2')
    })

    it('ignores an address that is not an object', () => {
      expect(buildLabel({ name: 'Nhà thờ Đức Bà', address: 'Công xã Paris' })).toBe('Nhà thờ Đức Bà')
      expect(buildLabel({ name: 'Nhà thờ Đức Bà', address: ['Công xã Paris'] })).toBe(
        'Nhà thờ Đức Bà'
      )
      expect(buildLabel({ name: 'Nhà thờ Đức Bà', address: null })).toBe('Nhà thờ Đức Bà')
    })

    it('returns the placeholder for an empty match', () => {
      expect(buildLabel({})).toBe(UNKNOWN_PLACE)
    })

    it('returns the placeholder when every field has the wrong type', () => {
      expect(buildLabel({ name: 42, display_name: ['x'], address: 'street' })).toBe(UNKNOWN_PLACE)
    })

    it('returns a non-empty label for degenerate inputs', () => {
      const inputs = [
        {},
        { name: '   ' },
        { display_name: ',,,' },
        { name: 'Đường ' },
        { address: { road: 'Đường ', suburb: 'Phường ' } },
        { name: false, display_name: 0, address: 1 }
      ]

      for (const input of inputs) {
        expect(buildLabel(input).trim()).not.toBe('')
      }
    })
  })

  describe('resolveBaseName', () => {
    it('trims the name', () => {
      expect(resolveBaseName({ name: '  Dinh Độc Lập  ' })).toBe('Dinh Độc Lập')
    })

    it('falls back to the trimmed head of display_name when name is blank', () => {
      expect(resolveBaseName({ name: '   ', display_name: '  Bến Nhà Rồng , Quận 4' })).toBe(
        'Bến Nhà Rồng'
      )
    })

    it('falls back to the placeholder when display_name starts with a comma', () => {
      expect(resolveBaseName({ display_name: ', Quận 1' })).toBe(UNKNOWN_PLACE)
    })
  })

  describe('beautify', () => {
    it('abbreviates every occurrence', () => {
      expect(beautify('Phường 1, Phường 2, Khu phố 5, Đường 3 Tháng 2')).toBe(
        'P. 1, P. 2, KP 5, 3 Tháng 2'
      )
    })

    it('leaves prefixes without a trailing space alone', () => {
      expect(beautify('Phường')).toBe('Phường')
    })

    it('resolves matches spliced together by a removal', () => {
      expect(beautify('PhĐường ường 5')).toBe('P. 5')
    })

    it('is idempotent', () => {
      const inputs = [
        'Chợ Lớn — Phường 11, Khu phố 2',
        'PhĐường ường 5',
        'Khu Đường phố 4',
        'Đường Đường Lê Duẩn'
      ]

      for (const input of inputs) {
        const once = beautify(input)
        expect(beautify(once)).toBe(once)
      }
    })
  })

  describe('labelBaseName', () => {
    it('returns the text before the separator', () => {
      expect(labelBaseName('Chợ Bến Thành — P. Bến Thành')).toBe('Chợ Bến Thành')
    })

    it('returns the whole label when there is no separator', () => {
      expect(labelBaseName(' Dinh Độc Lập ')).toBe('Dinh Độc Lập')
    })
  })
})
