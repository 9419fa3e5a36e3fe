import chai from "chai";
import { extractBit, extractBitAsBool, extractBits, insertBit } from "../lib/bits.js";

describe("bits", function () {
  describe("extractBit", function () {
    it("indexes bits from the most significant one", function () {
      chai.assert.strictEqual(extractBit(0b10000000, 0), 1);
      chai.assert.strictEqual(extractBit(0b10000000, 7), 0);
      chai.assert.strictEqual(extractBit(0b00000001, 7), 1);
      chai.assert.strictEqual(extractBit(0b00000001, 0), 0);
    });

    it("reconstructs every byte from its eight bits", function () {
      for (let byte: number = 0; byte < 256; byte++) {
        let actual: number = 0;
        for (let i: number = 0; i < 8; i++) {
          actual = (actual << 1) | extractBit(byte, i);
        }
        chai.assert.strictEqual(actual, byte);
      }
    });
  });

  describe("extractBits", function () {
    it("returns the selected bits right-justified", function () {
      chai.assert.strictEqual(extractBits(0b10110010, 0, 3), 0b101);
      chai.assert.strictEqual(extractBits(0b10110010, 3, 5), 0b10010);
      chai.assert.strictEqual(extractBits(0b01100000, 1, 2), 0b11);
      chai.assert.strictEqual(extractBits(0xff, 2, 4), 0b1111);
      chai.assert.strictEqual(extractBits(0b00000001, 7, 1), 1);
    });

    it("returns the whole byte for the full range", function () {
      for (let byte: number = 0; byte < 256; byte++) {
        chai.assert.strictEqual(extractBits(byte, 0, 8), byte);
      }
    });
  });

  describe("extractBitAsBool", function () {
    it("is true only for set bits", function () {
      chai.assert.isTrue(extractBitAsBool(0b00100000, 2));
      chai.assert.isFalse(extractBitAsBool(0b00100000, 3));
      chai.assert.isFalse(extractBitAsBool(0x00, 0));
      chai.assert.isTrue(extractBitAsBool(0xff, 7));
    });
  });

  describe("insertBit", function () {
    it("sets and clears single bits", function () {
      chai.assert.strictEqual(insertBit(0x00, 0, true), 0b10000000);
      chai.assert.strictEqual(insertBit(0xff, 7, false), 0b11111110);
      chai.assert.strictEqual(insertBit(0b00000010, 4, true), 0b00001010);
      chai.assert.strictEqual(insertBit(0b00001010, 4, true), 0b00001010);
      chai.assert.strictEqual(insertBit(0b10000000, 0, false), 0x00);
    });

    it("only changes the addressed bit", function () {
      for (let byte: number = 0; byte < 256; byte++) {
        for (let i: number = 0; i < 8; i++) {
          for (const value of [false, true]) {
            const actual: number = insertBit(byte, i, value);
            chai.assert.strictEqual(extractBitAsBool(actual, i), value);
            chai.assert.strictEqual((actual ^ byte) & ~(1 << (7 - i)), 0);
            chai.assert.isAtLeast(actual, 0);
            chai.assert.isAtMost(actual, 0xff);
          }
        }
      }
    });
  });
});
