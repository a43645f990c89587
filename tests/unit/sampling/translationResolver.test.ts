import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { InMemoryCorpus } from "../../../src/providers/corpus.js";
import { ProviderError } from "../../../src/providers/errors.js";
import type { TranslationProvider } from "../../../src/providers/types.js";
import { resolveTranslations } from "../../../src/sampling/translationResolver.js";
import { expectRejection } from "../../helpers/assertions.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";

const corpus = InMemoryCorpus.fromInput({
  languages: {
    en: {
      Algebra: { translations: { fr: "Algèbre", es: "Álgebra", de: "Algebra" } },
      Topology: { translations: { fr: "Topologie", en: "Topology" } },
      Calculus: {},
    },
  },
});

describe("sampling/translationResolver", () => {
  it("keeps configured target languages only", async () => {
    const table = await resolveTranslations(corpus, ["Algebra", "Calculus"], "en", ["en", "fr", "es"]);

    expect(Array.from(table.keys())).to.deep.equal(["Algebra", "Calculus"]);
    expect(Object.fromEntries(table.get("Algebra") ?? [])).to.deep.equal({ fr: "Algèbre", es: "Álgebra" });
    expect(table.get("Calculus")?.size).to.equal(0);
  });

  it("drops the vertex's own language and self references", async () => {
    const table = await resolveTranslations(corpus, ["Topology"], "en", ["en", "fr"]);
    expect(Object.fromEntries(table.get("Topology") ?? [])).to.deep.equal({ fr: "Topologie" });
  });

  it("records an empty entry for missing documents", async () => {
    const logger = new RecordingLogger();
    const table = await resolveTranslations(corpus, ["Ghost"], "en", ["fr"], { logger });
    expect(table.get("Ghost")?.size).to.equal(0);
    expect(logger.messages("warn")).to.deep.equal(["translation_vertex_missing"]);
  });

  it("queries each distinct vertex once", async () => {
    const getTranslations = sinon.stub().resolves({ fr: "X" });
    const provider: TranslationProvider = { getTranslations };
    await resolveTranslations(provider, ["A", "B", "A"], "en", ["fr"]);
    expect(getTranslations.callCount).to.equal(2);
    expect(getTranslations.firstCall.args.slice(0, 2)).to.deep.equal(["A", "en"]);
  });

  it("propagates provider failures", async () => {
    const provider: TranslationProvider = {
      getTranslations: sinon.stub().rejects(new ProviderError("throttled")),
    };
    await expectRejection(resolveTranslations(provider, ["A"], "en", ["fr"]), ProviderError);
  });
});
