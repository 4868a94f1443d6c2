/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

export const WordWidth = 9;
export const OpcodeWidth = 3;
export const RegisterWidth = 3;
export const MemSize = 1 << WordWidth;

export const RegisterOpcodes: ReadonlyMap<string, number> = new Map([
    ["mv", 0],
    ["add", 2],
    ["sub", 3],
    ["ld", 4],
    ["st", 5],
    ["mvnz", 6],
    ["and", 7],
]);

export const ImmediateOpcodes: ReadonlyMap<string, number> = new Map([
    ["mvi", 1],
]);

export const Registers: ReadonlyMap<string, number> = new Map([
    ["R0", 0], ["R1", 1], ["R2", 2], ["R3", 3],
    ["R4", 4], ["R5", 5], ["R6", 6],
    ["PC", 7],
]);

export function fitsWidth(value: number, width: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < 2 ** width;
}
