import { randomUUID } from "node:crypto";

export interface IdGenerator {
  next(): string;
}

export class CryptoIdGenerator implements IdGenerator {
  constructor(private readonly prefix = "") {}

  next(): string {
    return `${this.prefix}${randomUUID()}`;
  }
}

export class SequentialIdGenerator implements IdGenerator {
  private counter = 0;

  constructor(private readonly prefix = "id_") {}

  next(): string {
    this.counter += 1;
    return `${this.prefix}${this.counter}`;
  }
}
