import test from "node:test";
import assert from "node:assert/strict";
import { categorizeComponent } from "../src/category.js";

test("LED parts go to OTHER COMPONENTS before any other rule", () => {
  assert.equal(categorizeComponent("LED_RED_5MM", "red diode"), "OTHER COMPONENTS");
});

test("74-series logic is IC", () => {
  assert.equal(categorizeComponent("74HC595", null), "IC");
});

test("IC keywords match identifier or description", () => {
  assert.equal(categorizeComponent("LM317", null), "IC");
  assert.equal(categorizeComponent("U7", "voltage regulator"), "IC");
});

test("resistors by keyword or R_ prefix", () => {
  assert.equal(categorizeComponent("R_4K7", null), "RESISTOR");
  assert.equal(categorizeComponent("X1", "4.7k ohm"), "RESISTOR");
});

test("capacitors by keyword, value suffix or C_ prefix", () => {
  assert.equal(categorizeComponent("100UF", null), "CAPACITOR");
  assert.equal(categorizeComponent("C_22P", null), "CAPACITOR");
  assert.equal(categorizeComponent("X2", "tantalum cap"), "CAPACITOR");
});

test("diodes and transistors", () => {
  assert.equal(categorizeComponent("1N4007", "rectifier diode"), "DIODE");
  assert.equal(categorizeComponent("D_ZENER", null), "DIODE");
  assert.equal(categorizeComponent("IRF540", null), "TRANSISTORS");
  assert.equal(categorizeComponent("T_BC547", null), "TRANSISTORS");
});

test("unknown parts fall back to OTHER COMPONENTS", () => {
  assert.equal(categorizeComponent("HDR-2X20", "pin header"), "OTHER COMPONENTS");
  assert.equal(categorizeComponent(undefined, undefined), "OTHER COMPONENTS");
});
