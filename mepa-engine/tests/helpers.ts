import { ProgramImage } from "@/mepa-ast";

/** 10 刻みの行番号でプログラムを組み立てる */
export function programOf(...instructions: string[]): ProgramImage {
  const image = new ProgramImage();
  instructions.forEach((text, i) => image.setLine((i + 1) * 10, text));
  return image;
}
