import { Project } from "ts-morph";
import { beforeEach, describe, expect, it } from "vitest";
import {
  classifyStandaloneImport,
  extractClassEntities,
} from "./extractClassEntities.js";
import type { FileAnalysisContext } from "./FileAnalysisContext.js";

describe(extractClassEntities.name, () => {
  let project: Project;

  beforeEach(() => {
    project = new Project({ useInMemoryFileSystem: true });
  });

  const createContext = (filePath: string): FileAnalysisContext => ({
    filePath,
    root: "/repo",
    pathsBaseDir: "/repo",
  });

  const extract = (filePath: string, code: string) =>
    extractClassEntities(
      project.createSourceFile(`/repo/${filePath}`, code),
      createContext(filePath),
    );

  it("turns NgModule lists into placeholder relationships", () => {
    const [module] = extract(
      "src/app.module.ts",
      `@NgModule({
  declarations: [AppComponent],
  imports: [BrowserModule, RouterModule.forRoot(routes)],
  providers: [{ provide: ALPHA_TOKEN, useClass: AlphaService }],
  bootstrap: [AppComponent],
})
export class AppModule {}`,
    );

    expect(module).toMatchObject({
      id: "src/app.module.ts:AppModule",
      kind: "Module",
      name: "AppModule",
      filePath: "src/app.module.ts",
      properties: {
        exported: true,
        declarations: ["AppComponent"],
        imports: ["BrowserModule", "RouterModule"],
        providers: ["AlphaService"],
        bootstrap: ["AppComponent"],
        decorators: ["NgModule"],
      },
    });
    expect(module?.relationships).toEqual([
      {
        type: "DEFINED_IN",
        target: { status: "resolved", id: "src/app.module.ts" },
      },
      {
        type: "DECLARES",
        target: { status: "placeholder", hint: "Any", name: "AppComponent" },
      },
      {
        type: "IMPORTS_MODULE",
        target: { status: "placeholder", hint: "Module", name: "BrowserModule" },
      },
      {
        type: "IMPORTS_MODULE",
        target: { status: "placeholder", hint: "Module", name: "RouterModule" },
      },
      {
        type: "PROVIDES",
        target: { status: "placeholder", hint: "Service", name: "AlphaService" },
      },
      {
        type: "BOOTSTRAPS",
        target: {
          status: "placeholder",
          hint: "Component",
          name: "AppComponent",
        },
      },
    ]);
  });

  it("records component metadata and classifies standalone imports", () => {
    const [component] = extract(
      "src/app.component.ts",
      `@Component({
  selector: "app-root",
  templateUrl: "./app.component.html",
  standalone: true,
  imports: [DatePipe, HighlightDirective, FormsModule],
  providers: [AlphaService],
})
export class AppComponent {}`,
    );

    expect(component?.kind).toBe("Component");
    expect(component?.properties).toMatchObject({
      selector: "app-root",
      templateUrl: "./app.component.html",
      standalone: true,
    });
    expect(component?.relationships.slice(1)).toEqual([
      {
        type: "PROVIDES",
        target: { status: "placeholder", hint: "Service", name: "AlphaService" },
      },
      {
        type: "USES_PIPE",
        target: { status: "placeholder", hint: "Pipe", name: "DatePipe" },
      },
      {
        type: "USES_DIRECTIVE",
        target: {
          status: "placeholder",
          hint: "Directive",
          name: "HighlightDirective",
        },
      },
      {
        type: "IMPORTS_MODULE",
        target: { status: "placeholder", hint: "Module", name: "FormsModule" },
      },
    ]);
  });

  it("records complex metadata values as opaque markers", () => {
    const [component] = extract(
      "src/a.component.ts",
      "@Component({ selector: buildSelector() }) export class A {}",
    );

    expect(component?.properties.selector).toBe(
      "[Complex Value: CallExpression]",
    );
  });

  it("emits INJECTS for constructor and inject() dependencies", () => {
    const [service] = extract(
      "src/beta.service.ts",
      `@Injectable({ providedIn: "root" })
export class BetaService {
  private readonly gamma = inject(GammaService);
  constructor(private readonly alpha: AlphaService, store: Store<AppState>, id: string) {}
}`,
    );

    expect(service?.kind).toBe("Service");
    expect(service?.properties.providedIn).toBe("root");
    expect(service?.properties.constructorParameters).toEqual([
      "alpha:AlphaService",
      "store:Store",
    ]);
    expect(service?.relationships.slice(1)).toEqual([
      {
        type: "INJECTS",
        target: { status: "placeholder", hint: "Service", name: "AlphaService" },
        properties: { parameterName: "alpha" },
      },
      {
        type: "INJECTS",
        target: { status: "placeholder", hint: "Service", name: "Store" },
        properties: { parameterName: "store" },
      },
      {
        type: "INJECTS",
        target: { status: "placeholder", hint: "Service", name: "GammaService" },
        properties: { propertyName: "gamma" },
      },
    ]);
  });

  it("emits IMPLEMENTS and records extends on plain classes", () => {
    const [impl] = extract(
      "src/impl.ts",
      "class Impl extends Base implements OnInit, contracts.Loader {}",
    );

    expect(impl?.kind).toBe("Class");
    expect(impl?.properties).toEqual({
      exported: false,
      abstract: false,
      startLine: 1,
      endLine: 1,
      extends: "Base",
    });
    expect(impl?.relationships.slice(1)).toEqual([
      {
        type: "IMPLEMENTS",
        target: { status: "placeholder", hint: "Interface", name: "OnInit" },
      },
      {
        type: "IMPLEMENTS",
        target: { status: "placeholder", hint: "Interface", name: "Loader" },
      },
    ]);
  });

  it("registers methods with HAS_MEMBER and DEFINED_IN", () => {
    const entities = extract(
      "src/alpha.ts",
      `export class Alpha {
  static create() {}
  private async load() {}
}`,
    );

    expect(entities.map((e) => e.id)).toEqual([
      "src/alpha.ts:Alpha",
      "src/alpha.ts:Alpha.create",
      "src/alpha.ts:Alpha.load",
    ]);
    expect(entities[0]?.relationships).toEqual([
      { type: "DEFINED_IN", target: { status: "resolved", id: "src/alpha.ts" } },
      {
        type: "HAS_MEMBER",
        target: { status: "resolved", id: "src/alpha.ts:Alpha.create" },
      },
      {
        type: "HAS_MEMBER",
        target: { status: "resolved", id: "src/alpha.ts:Alpha.load" },
      },
    ]);
    expect(entities[2]).toEqual({
      id: "src/alpha.ts:Alpha.load",
      kind: "Method",
      name: "Alpha.load",
      filePath: "src/alpha.ts",
      properties: {
        static: false,
        async: true,
        visibility: "private",
        startLine: 3,
        endLine: 3,
      },
      relationships: [
        { type: "DEFINED_IN", target: { status: "resolved", id: "src/alpha.ts" } },
      ],
    });
  });

  it("skips anonymous classes", () => {
    expect(extract("src/anon.ts", "export default class {}")).toEqual([]);
  });
});

describe(classifyStandaloneImport.name, () => {
  it.each([
    ["DatePipe", "USES_PIPE", "Pipe"],
    ["HighlightDirective", "USES_DIRECTIVE", "Directive"],
    ["ChildComponent", "USES_DIRECTIVE", "Directive"],
    ["FormsModule", "IMPORTS_MODULE", "Module"],
  ])("%s → %s", (name, type, hint) => {
    expect(classifyStandaloneImport(name)).toEqual([type, hint]);
  });
});
