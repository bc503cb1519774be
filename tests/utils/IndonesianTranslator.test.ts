import { describe, it, expect } from "@jest/globals";
import { IndonesianTranslator, defaultTranslator } from "@/utils/IndonesianTranslator";

describe("IndonesianTranslator", () => {
  it("긴 구문을 우선 치환해야 함", () => {
    expect(defaultTranslator.translate("Gratis Ongkir Jakarta")).toBe("Free Shipping Jakarta");
  });

  it("단어 단위로 여러 용어를 치환해야 함", () => {
    expect(defaultTranslator.translate("HP Bekas Mulus")).toBe("HP Used Excellent Condition");
  });

  it("단어 일부는 치환하지 않아야 함", () => {
    expect(defaultTranslator.translate("Gratisan")).toBe("Gratisan");
  });

  it("대소문자를 구분해야 함", () => {
    expect(defaultTranslator.translate("barang bekas")).toBe("barang bekas");
  });

  it("마침표로 끝나는 용어도 치환해야 함", () => {
    expect(defaultTranslator.translate("Kab. Bogor")).toBe("Regency Bogor");
  });

  it("null / undefined는 null을 반환해야 함", () => {
    expect(defaultTranslator.translate(null)).toBeNull();
    expect(defaultTranslator.translate(undefined)).toBeNull();
  });

  it("치환 결과를 다시 치환하지 않아야 함", () => {
    const translator = new IndonesianTranslator({ Satu: "Dua", Dua: "Tiga" });

    expect(translator.translate("Satu Dua")).toBe("Dua Tiga");
  });

  it("빈 사전이면 원문을 그대로 반환해야 함", () => {
    const translator = new IndonesianTranslator({ Sama: "Sama" });

    expect(translator.translate("Sama saja")).toBe("Sama saja");
  });
});
