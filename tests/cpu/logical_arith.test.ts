import { describe, it, expect } from 'vitest';
import { cpuWithProgram } from '../helpers/cpuh';

describe('CPU: ADC / SBC', () => {
  it('ADC $7F + $01 sets overflow and negative', () => {
    const { cpu } = cpuWithProgram([0x69, 0x01]); // ADC #$01
    cpu.reg.a = 0x7F;
    cpu.flags.carry = false;
    cpu.step();
    expect(cpu.reg.a).toBe(0x80);
    expect(cpu.flags.carry).toBe(false);
    expect(cpu.flags.overflow).toBe(true);
    expect(cpu.flags.negative).toBe(true);
    expect(cpu.flags.zero).toBe(false);
  });

  it('ADC carries out of bit 7', () => {
    const { cpu } = cpuWithProgram([0x69, 0x01]);
    cpu.reg.a = 0xFF;
    cpu.step();
    expect(cpu.reg.a).toBe(0x00);
    expect(cpu.flags.carry).toBe(true);
    expect(cpu.flags.zero).toBe(true);
    expect(cpu.flags.overflow).toBe(false);
  });

  it('ADC adds the incoming carry', () => {
    const { cpu } = cpuWithProgram([0x69, 0x10]);
    cpu.reg.a = 0x01;
    cpu.flags.carry = true;
    cpu.step();
    expect(cpu.reg.a).toBe(0x12);
  });

  it('SBC $00 - $01 borrows and wraps to $FF', () => {
    const { cpu } = cpuWithProgram([0xE9, 0x01]); // SBC #$01
    cpu.reg.a = 0x00;
    cpu.flags.carry = true;
    cpu.step();
    expect(cpu.reg.a).toBe(0xFF);
    expect(cpu.flags.carry).toBe(false);
    expect(cpu.flags.negative).toBe(true);
    expect(cpu.flags.overflow).toBe(false);
  });

  it('SBC detects signed overflow', () => {
    const { cpu } = cpuWithProgram([0xE9, 0xB0]); // $50 - $B0 = 80 - (-80)
    cpu.reg.a = 0x50;
    cpu.flags.carry = true;
    cpu.step();
    expect(cpu.reg.a).toBe(0xA0);
    expect(cpu.flags.overflow).toBe(true);
    expect(cpu.flags.carry).toBe(false);
  });

  it('decimal flag does not change ADC', () => {
    const { cpu } = cpuWithProgram([0xF8, 0x69, 0x09]); // SED; ADC #$09
    cpu.reg.a = 0x09;
    cpu.step();
    cpu.step();
    expect(cpu.flags.decimal).toBe(true);
    expect(cpu.reg.a).toBe(0x12);
  });
});

describe('CPU: compares', () => {
  it('CMP equal sets Z and C', () => {
    const { cpu } = cpuWithProgram([0xC9, 0x10]);
    cpu.reg.a = 0x10;
    cpu.step();
    expect([cpu.flags.zero, cpu.flags.carry, cpu.flags.negative]).toEqual([true, true, false]);
  });

  it('CMP smaller register borrows and takes N from the difference', () => {
    const { cpu } = cpuWithProgram([0xC9, 0x10]);
    cpu.reg.a = 0x05;
    cpu.step();
    expect([cpu.flags.zero, cpu.flags.carry, cpu.flags.negative]).toEqual([false, false, true]);
  });

  it('CPX and CPY compare the index registers', () => {
    const { cpu } = cpuWithProgram([0xE0, 0x05, 0xC0, 0x07]); // CPX #$05; CPY #$07
    cpu.reg.x = 0x06;
    cpu.reg.y = 0x07;
    cpu.step();
    expect([cpu.flags.zero, cpu.flags.carry, cpu.flags.negative]).toEqual([false, true, false]);
    cpu.step();
    expect([cpu.flags.zero, cpu.flags.carry]).toEqual([true, true]);
  });
});

describe('CPU: increments and decrements', () => {
  it('INC wraps memory and leaves carry alone', () => {
    const { cpu, bus } = cpuWithProgram([0xE6, 0x10]);
    bus.write(0x10, 0xFF);
    cpu.flags.carry = true;
    cpu.step();
    expect(bus.read(0x10)).toBe(0x00);
    expect(cpu.flags.zero).toBe(true);
    expect(cpu.flags.carry).toBe(true);
  });

  it('DEC wraps memory below zero', () => {
    const { cpu, bus } = cpuWithProgram([0xC6, 0x10]);
    cpu.step();
    expect(bus.read(0x10)).toBe(0xFF);
    expect(cpu.flags.negative).toBe(true);
  });

  it('INX / DEX / INY / DEY wrap at 8 bits', () => {
    const { cpu } = cpuWithProgram([0xCA, 0xE8, 0x88, 0xC8]); // DEX; INX; DEY; INY
    cpu.step();
    expect(cpu.reg.x).toBe(0xFF);
    cpu.step();
    expect(cpu.reg.x).toBe(0x00);
    expect(cpu.flags.zero).toBe(true);
    cpu.step();
    expect(cpu.reg.y).toBe(0xFF);
    expect(cpu.flags.negative).toBe(true);
    cpu.step();
    expect(cpu.reg.y).toBe(0x00);
  });
});

describe('CPU: logic', () => {
  it('AND, ORA and EOR set Z/N from the accumulator', () => {
    const { cpu } = cpuWithProgram([0x29, 0x0F, 0x09, 0x80, 0x49, 0x80]); // AND #$0F; ORA #$80; EOR #$80
    cpu.reg.a = 0xF0;
    cpu.step();
    expect(cpu.reg.a).toBe(0x00);
    expect(cpu.flags.zero).toBe(true);
    cpu.step();
    expect(cpu.reg.a).toBe(0x80);
    expect(cpu.flags.negative).toBe(true);
    cpu.step();
    expect(cpu.reg.a).toBe(0x00);
    expect(cpu.flags.zero).toBe(true);
  });

  it('BIT copies bits 7 and 6 and tests A & M', () => {
    const { cpu, bus } = cpuWithProgram([0x24, 0x10]);
    bus.write(0x10, 0xC0);
    cpu.reg.a = 0x01;
    cpu.step();
    expect([cpu.flags.zero, cpu.flags.negative, cpu.flags.overflow]).toEqual([true, true, true]);
    expect(cpu.reg.a).toBe(0x01);
  });
});
