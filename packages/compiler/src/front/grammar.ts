import * as ohm from 'ohm-js'

/**
 * Ohm grammar for the Tessera surface syntax.
 *
 * Binary operators are left-recursive rules, lowest precedence first.
 * Keywords are guarded by `~identPart` so `reference` is still an identifier.
 */
const grammarSource = String.raw`
Tessera {
  Unit = unitKw ident ";" Item*

  Item = StorageDecl
       | StructDecl
       | FnDecl

  StorageDecl = storageKw "{" ListOf<StorageField, ","> ","? "}"
  StorageField = ident ":" StorageType
  StorageType = mapKw "<" TypeRef "," TypeRef ">"  -- keyed
              | TypeRef                            -- scalar

  StructDecl = copyKw? structKw typeName "{" ListOf<FieldDecl, ","> ","? "}"
  FieldDecl = ident ":" TypeRef

  FnDecl = Annotation* pubKw? fnKw ident "(" ListOf<Param, ","> ")" ReturnType? Block
  Annotation = "#[" annotationText "]"
  Param = ParamMode? ident ":" TypeRef
  ParamMode = refKw | mutKw
  ReturnType = "->" TypeRef
  TypeRef = ident

  Block = "{" Stmt* "}"

  Stmt = LetStmt
       | IfStmt
       | WhileStmt
       | ReturnStmt
       | RevertStmt
       | RequireStmt
       | EmitStmt
       | AssignStmt
       | ExprStmt

  LetStmt = bindingKw ident TypeAnn? "=" Expr ";"
  TypeAnn = ":" TypeRef
  IfStmt = ifKw Expr Block ElseClause?
  ElseClause = elseKw IfStmt  -- elif
             | elseKw Block   -- else
  WhileStmt = whileKw Expr Block
  ReturnStmt = returnKw Expr? ";"
  RevertStmt = revertKw "(" stringLit ")" ";"
  RequireStmt = requireKw "(" Expr "," stringLit ")" ";"
  EmitStmt = emitKw "(" stringLit "," Expr ")" ";"
  AssignStmt = Postfix assignOp Expr ";"
  ExprStmt = Expr ";"

  Expr = OrExpr

  OrExpr = OrExpr "||" AndExpr  -- binary
         | AndExpr
  AndExpr = AndExpr "&&" CmpExpr  -- binary
          | CmpExpr
  CmpExpr = BitOrExpr cmpOp BitOrExpr  -- binary
          | BitOrExpr
  BitOrExpr = BitOrExpr bitOrOp BitXorExpr  -- binary
            | BitXorExpr
  BitXorExpr = BitXorExpr "^" BitAndExpr  -- binary
             | BitAndExpr
  BitAndExpr = BitAndExpr bitAndOp ShiftExpr  -- binary
             | ShiftExpr
  ShiftExpr = ShiftExpr shiftOp AddExpr  -- binary
            | AddExpr
  AddExpr = AddExpr addOp MulExpr  -- binary
          | MulExpr
  MulExpr = MulExpr mulOp UnaryExpr  -- binary
          | UnaryExpr
  UnaryExpr = "!" UnaryExpr  -- not
            | "-" UnaryExpr  -- neg
            | Postfix

  Postfix = Postfix "." ident "(" ListOf<Expr, ","> ")"  -- method
          | Postfix "." ident                           -- field
          | Postfix "[" Expr "]"                        -- index
          | Primary

  Primary = "(" Expr ")"                                  -- paren
          | typeName "{" ListOf<FieldInit, ","> ","? "}"  -- struct
          | storageKw "." ident                           -- storage
          | ident "(" ListOf<Expr, ","> ")"               -- call
          | intLit                                        -- int
          | stringLit                                     -- string
          | trueKw                                        -- true
          | falseKw                                       -- false
          | ident                                         -- name

  FieldInit = ident ":" Expr

  cmpOp = "==" | "!=" | "<=" | ">=" | "<" ~"<" | ">" ~">"
  bitOrOp = "|" ~"|"
  bitAndOp = "&" ~"&"
  shiftOp = "<<" | ">>"
  addOp = "+" | "-"
  mulOp = "*" | "/" | "%"
  assignOp = "=" ~"="

  annotationText = (stringLit | ~"]" any)*

  bindingKw = letKw | varKw

  unitKw = "unit" ~identPart
  storageKw = "storage" ~identPart
  mapKw = "map" ~identPart
  structKw = "struct" ~identPart
  copyKw = "copy" ~identPart
  pubKw = "pub" ~identPart
  fnKw = "fn" ~identPart
  refKw = "ref" ~identPart
  mutKw = "mut" ~identPart
  letKw = "let" ~identPart
  varKw = "var" ~identPart
  ifKw = "if" ~identPart
  elseKw = "else" ~identPart
  whileKw = "while" ~identPart
  returnKw = "return" ~identPart
  revertKw = "revert" ~identPart
  requireKw = "require" ~identPart
  emitKw = "emit" ~identPart
  trueKw = "true" ~identPart
  falseKw = "false" ~identPart

  keyword = unitKw | storageKw | mapKw | structKw | copyKw | pubKw | fnKw
          | refKw | mutKw | letKw | varKw | ifKw | elseKw | whileKw
          | returnKw | revertKw | requireKw | emitKw | trueKw | falseKw

  ident = ~keyword identStart identPart*
  typeName = ~keyword upper identPart*
  identStart = letter | "_"
  identPart = alnum | "_"

  intLit = "0x" hexDigit+  -- hex
         | digit+          -- dec

  stringLit = "\"" (~"\"" ~"\n" any)* "\""

  space += comment
  comment = "//" (~"\n" any)*
}
`

/**
 * The compiled Tessera grammar.
 */
export const TesseraGrammar = ohm.grammar(grammarSource)

/**
 * Match input against the grammar without building a tree.
 */
export function match(input: string): ohm.MatchResult {
	return TesseraGrammar.match(input)
}
