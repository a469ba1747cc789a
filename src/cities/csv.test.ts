import { parseCsvLine, splitCsvLines } from './csv.js';

describe('csv', () => {
  describe('parseCsvLine', () => {
    it('should split plain fields', () => {
      expect(parseCsvLine('Austin,tx,1.05')).toEqual(['Austin', 'tx', '1.05']);
    });

    it('should keep commas inside quotes', () => {
      expect(parseCsvLine('"Winston-Salem, East",nc,1')).toEqual(['Winston-Salem, East', 'nc', '1']);
    });

    it('should unescape doubled quotes', () => {
      expect(parseCsvLine('a,"say ""hi""",c')).toEqual(['a', 'say "hi"', 'c']);
    });

    it('should keep empty fields', () => {
      expect(parseCsvLine('a,,c')).toEqual(['a', '', 'c']);
      expect(parseCsvLine('a,b,')).toEqual(['a', 'b', '']);
    });
  });

  describe('splitCsvLines', () => {
    it('should drop blank lines and keep physical line numbers', () => {
      expect(splitCsvLines('\uFEFFcity,state\r\n\r\nAustin,tx\n')).toEqual([
        { lineNumber: 1, raw: 'city,state' },
        { lineNumber: 3, raw: 'Austin,tx' },
      ]);
    });

    it('should return nothing for empty text', () => {
      expect(splitCsvLines('')).toEqual([]);
    });
  });
});
