/**
 * RowMapper Unit Tests
 *
 * Statements are captured by a RecordingConnection, so the SQL template
 * and its bound parameters can be checked separately.
 */

import {
  BinaryColumn,
  BoolColumn,
  DataColumn,
  FloatColumn,
  IntegerColumn,
  StringColumn,
  TimestampColumn,
} from "../../src/columns/DataColumn";
import {
  ArgumentError,
  ColumnLookupError,
  ConfigurationError,
  TypeMismatchError,
} from "../../src/core/errors";
import { SqlDataType } from "../../src/db/DataConnection";
import { DataEntity, RowMapper } from "../../src/query/RowMapper";
import { ValidationErrorCode } from "../../src/query/ValidationError";
import {
  orderFromMap,
  WHERE_AND,
  WHERE_COMPARISON_KEY,
  whereFromMap,
  whereFromPairs,
} from "../../src/query/WhereClause";
import { RecordingConnection } from "../helpers/RecordingConnection";

class Widget implements DataEntity {
  readonly mapper: RowMapper;

  constructor() {
    this.mapper = RowMapper.forEntity(this);
  }

  tableName(): string {
    return "widgets";
  }

  columns(): DataColumn[] {
    return [
      new IntegerColumn("Id"),
      new StringColumn("Name", null, { isRequired: true, minLength: 2, maxLength: 10 }),
      new IntegerColumn("Age", null, { minRange: 1, maxRange: 120 }),
    ];
  }
}

class Account extends Widget {
  tableName(): string {
    return "accounts";
  }

  localValidation(mapper: RowMapper): void {
    if (mapper.getColumnString("Name") === "root") {
      mapper.addCustomValidationError("Name", "Name is reserved");
    }
  }
}

function paintMapper(): RowMapper {
  return new RowMapper({
    tableName: "paints",
    columns: [
      new IntegerColumn("Id"),
      new StringColumn("Colour"),
      new IntegerColumn("Size"),
    ],
  });
}

function eventMapper(): RowMapper {
  return new RowMapper({
    tableName: "events",
    columns: [
      new IntegerColumn("Id"),
      new TimestampColumn("Created"),
      new BinaryColumn("Payload"),
      new BoolColumn("Active"),
      new FloatColumn("Price"),
    ],
  });
}

function errorCodes(mapper: RowMapper): Array<[string, ValidationErrorCode]> {
  return mapper
    .getValidationErrors()
    .map((error): [string, ValidationErrorCode] => [error.columnKey, error.code]);
}

describe("RowMapper", () => {
  let db: RecordingConnection;
  let widget: Widget;

  beforeEach(() => {
    db = new RecordingConnection();
    widget = new Widget();
  });

  describe("columns", () => {
    it("should take the table and columns from the entity", () => {
      expect(widget.mapper.getTableName()).toBe("widgets");
      expect(widget.mapper.getAllColumnNames()).toEqual(['"Id"', '"Name"', '"Age"']);
      expect(widget.mapper.getAllColumnNames(false)).toEqual(["Id", "Name", "Age"]);
    });

    it("should append columns in declaration order", () => {
      const mapper = new RowMapper({ tableName: "t" });
      mapper.addColumns(new IntegerColumn("Id"));
      mapper.addColumns(new StringColumn("B"), new StringColumn("A"));

      expect(mapper.getAllColumnNames(false)).toEqual(["Id", "B", "A"]);
    });
  });

  describe("setters and getters", () => {
    it("should strip markup from strings unless told otherwise", () => {
      widget.mapper.setColumnString("Name", " <b>abc</b> ");
      expect(widget.mapper.getColumnString("Name")).toBe("abc");

      widget.mapper.setColumnString("Name", "<b>abc</b>", false);
      expect(widget.mapper.getColumnString("Name")).toBe("<b>abc</b>");
    });

    it("should store null only when allowed", () => {
      widget.mapper.setColumnString("Name", null);
      expect(widget.mapper.getColumnString("Name", true)).toBe("");

      widget.mapper.setColumnString("Name", null, true, true);
      expect(widget.mapper.getColumnString("Name", true)).toBeNull();
    });

    it("should ignore unknown keys when setting", () => {
      expect(() => widget.mapper.setColumnString("Missing", "x")).not.toThrow();
    });

    it("should throw for unknown keys when getting", () => {
      expect(() => widget.mapper.getColumnString("Missing")).toThrow(ColumnLookupError);
      expect(() => widget.mapper.getColumnInteger("Missing")).toThrow(
        "Column does not exist: Missing"
      );
    });

    it("should replace null with the type's zero value", () => {
      const events = eventMapper();

      expect(widget.mapper.getColumnInteger("Age")).toBe(0);
      expect(widget.mapper.getColumnInteger("Age", true)).toBeNull();
      expect(widget.mapper.getColumnString("Name")).toBe("");
      expect(events.getColumnBool("Active")).toBe(false);
      expect(events.getColumnFloat("Price")).toBe(0);
      expect(events.getColumnDateTime("Created").getTime()).toBe(0);
      expect(events.getColumnData("Payload").length).toBe(0);
    });

    it("should throw when a column is read as the wrong type", () => {
      widget.mapper.setColumnInteger("Age", 5);

      expect(() => widget.mapper.getColumnString("Age")).toThrow(TypeMismatchError);
      expect(() => widget.mapper.getColumnString("Age")).toThrow(
        "Age: Column does not contain string data"
      );
    });

    it("should throw when a coerced value does not fit the column", () => {
      expect(() => widget.mapper.setColumnInteger("Name", "12")).toThrow(
        TypeMismatchError
      );
    });

    it("should coerce input for each column type", () => {
      const events = eventMapper();
      events.setColumnDateTime("Created", "2024-01-02 03:04:05");
      events.setColumnBoolean("Active", "on");
      events.setColumnFloat("Price", "9.5");
      widget.mapper.setColumnInteger("Age", "42 years");

      expect(events.getColumnDateTime("Created").toISOString()).toBe(
        "2024-01-02T03:04:05.000Z"
      );
      expect(events.getColumnBool("Active")).toBe(true);
      expect(events.getColumnFloat("Price")).toBe(9.5);
      expect(widget.mapper.getColumnInteger("Age")).toBe(42);
    });

    it("should only set timestamps on timestamp columns", () => {
      widget.mapper.setColumnString("Name", "abc");
      widget.mapper.setColumnDateTime("Name", "2024-01-02");

      expect(widget.mapper.getColumnString("Name")).toBe("abc");
    });

    it("should store string data as UTF-8 bytes", () => {
      const events = eventMapper();
      events.setColumnData("Payload", "héllo");

      expect(events.getColumnData("Payload")).toEqual(Buffer.from("héllo", "utf8"));

      events.setColumnData("Payload", null);
      expect(events.getColumnData("Payload", true)?.length).toBe(0);

      events.setColumnData("Payload", null, true);
      expect(events.getColumnData("Payload", true)).toBeNull();
    });
  });

  describe("addColumnsToParameters()", () => {
    beforeEach(() => {
      widget.mapper.setColumnInteger("Id", 7);
      widget.mapper.setColumnString("Name", "abc");
      widget.mapper.setColumnInteger("Age", 5);
    });

    it("should bind every column except the identity", async () => {
      expect(widget.mapper.addColumnsToParameters(db)).toBe(2);

      await db.query("?,?");
      expect(db.lastQuery().params).toEqual([
        { type: SqlDataType.String, value: "abc" },
        { type: SqlDataType.Integer, value: 5 },
      ]);
    });

    it("should skip the listed keys", async () => {
      expect(widget.mapper.addColumnsToParameters(db, ["Age"])).toBe(1);

      await db.query("?");
      expect(db.lastQuery().params).toEqual([{ type: SqlDataType.String, value: "abc" }]);
    });

    it("should bind only the listed keys in include mode", async () => {
      expect(widget.mapper.addColumnsToParameters(db, ["Age", "Id"], true)).toBe(1);

      await db.query("?");
      expect(db.lastQuery().params).toEqual([{ type: SqlDataType.Integer, value: 5 }]);
    });
  });

  describe("loadColumnValues()", () => {
    it("should copy matching keys through the typed setters", () => {
      const loaded = widget.mapper.loadColumnValues({
        Id: "7",
        Name: "<b>abc</b>",
        Age: null,
        Extra: 1,
      });

      expect(loaded).toBe(true);
      expect(widget.mapper.getColumnInteger("Id")).toBe(7);
      expect(widget.mapper.getColumnString("Name")).toBe("<b>abc</b>");
      expect(widget.mapper.getColumnInteger("Age", true)).toBeNull();
    });

    it("should leave columns missing from the row alone", () => {
      widget.mapper.setColumnInteger("Age", 5);
      widget.mapper.loadColumnValues({ Name: "x" });

      expect(widget.mapper.getColumnInteger("Age")).toBe(5);
    });

    it("should load driver values of every type", () => {
      const events = eventMapper();
      const created = new Date(Date.UTC(2024, 0, 2));

      events.loadColumnValues({
        Created: created,
        Payload: Buffer.from([1, 2]),
        Active: 1,
        Price: "9.50",
      });

      expect(events.getColumnDateTime("Created").getTime()).toBe(created.getTime());
      expect(events.getColumnData("Payload")).toEqual(Buffer.from([1, 2]));
      expect(events.getColumnBool("Active")).toBe(true);
      expect(events.getColumnFloat("Price")).toBe(9.5);
    });

    it("should return false for a missing or empty row", () => {
      expect(widget.mapper.loadColumnValues(null)).toBe(false);
      expect(widget.mapper.loadColumnValues({})).toBe(false);
    });
  });

  describe("doValidation()", () => {
    it("should report an unset required column exactly once", () => {
      widget.mapper.setColumnString("Name", "");
      widget.mapper.setColumnInteger("Age", 5);

      expect(widget.mapper.doValidation()).toBe(true);

      const errors = widget.mapper.getValidationErrors();
      expect(errors).toHaveLength(1);
      expect(errors[0].columnKey).toBe("Name");
      expect(errors[0].code).toBe(ValidationErrorCode.ValueIsNotSet);
      expect(errors[0].message).toBe("Value has not been specified.");
    });

    it("should pass valid values", () => {
      widget.mapper.setColumnString("Name", "abc");
      widget.mapper.setColumnInteger("Age", 5);

      expect(widget.mapper.doValidation()).toBe(false);
      expect(widget.mapper.hasValidationErrors()).toBe(false);
      expect(widget.mapper.getValidationErrors()).toEqual([]);
    });

    it("should report nothing before the first pass", () => {
      expect(widget.mapper.hasValidationErrors()).toBe(false);
      expect(widget.mapper.getValidationErrors()).toEqual([]);
    });

    it.each([
      ["a", 5, ["Name", ValidationErrorCode.ValueLengthTooShort]],
      ["abcdefghijk", 5, ["Name", ValidationErrorCode.ValueLengthTooLong]],
      ["abc", 0, ["Age", ValidationErrorCode.ValueRangeTooLow]],
      ["abc", 121, ["Age", ValidationErrorCode.ValueRangeTooHigh]],
    ])("should check %j / %j against the column limits", (name, age, expected) => {
      widget.mapper.setColumnString("Name", name);
      widget.mapper.setColumnInteger("Age", age);

      widget.mapper.doValidation();

      expect(errorCodes(widget.mapper)).toEqual([expected]);
    });

    it("should skip range checks for null values", () => {
      widget.mapper.setColumnString("Name", "abc");
      widget.mapper.setColumnInteger("Age", null, true);

      expect(widget.mapper.doValidation()).toBe(false);
    });

    it("should stop at the first error when asked to", () => {
      widget.mapper.setColumnString("Name", "");
      widget.mapper.setColumnInteger("Age", 200);

      expect(widget.mapper.doValidation(null, true)).toBe(true);
      expect(errorCodes(widget.mapper)).toEqual([
        ["Name", ValidationErrorCode.ValueIsNotSet],
      ]);

      widget.mapper.doValidation();
      expect(errorCodes(widget.mapper)).toEqual([
        ["Name", ValidationErrorCode.ValueIsNotSet],
        ["Age", ValidationErrorCode.ValueRangeTooHigh],
      ]);
    });

    it("should only check the filtered columns", () => {
      widget.mapper.setColumnString("Name", "");
      widget.mapper.setColumnInteger("Age", 200);

      widget.mapper.doValidation(["Age"]);

      expect(errorCodes(widget.mapper)).toEqual([
        ["Age", ValidationErrorCode.ValueRangeTooHigh],
      ]);
    });

    it("should report a null in a not-null column only once", () => {
      const mapper = new RowMapper({
        columns: [new StringColumn("Code", null, { notNull: true, isRequired: true })],
      });

      mapper.doValidation();

      expect(errorCodes(mapper)).toEqual([["Code", ValidationErrorCode.ValueCannotBeNull]]);
      expect(mapper.getValidationErrors()[0].message).toBe("Value must be set.");
    });

    it("should treat an epoch timestamp as not set", () => {
      const mapper = new RowMapper({
        columns: [new TimestampColumn("Created", null, { isRequired: true })],
      });

      mapper.doValidation();

      expect(errorCodes(mapper)).toEqual([["Created", ValidationErrorCode.ValueIsNotSet]]);
    });

    it("should compare timestamp ranges in Unix seconds", () => {
      const mapper = new RowMapper({
        columns: [new TimestampColumn("Created", null, { minRange: 1704067200 })],
      });
      mapper.setColumnDateTime("Created", "2023-06-01 00:00:00");

      mapper.doValidation();

      expect(errorCodes(mapper)).toEqual([
        ["Created", ValidationErrorCode.ValueRangeTooLow],
      ]);
    });

    it("should run the entity's local validation after the columns", () => {
      const account = new Account();
      account.mapper.setColumnString("Name", "root");

      expect(account.mapper.doValidation()).toBe(true);

      const errors = account.mapper.getValidationErrors();
      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe(ValidationErrorCode.CustomError);
      expect(errors[0].message).toBe("Name is reserved");
    });

    it("should still run local validation after stopping at the first column error", () => {
      const account = new Account();
      account.mapper.setColumnString("Name", "root");
      account.mapper.setColumnInteger("Age", 500);

      expect(account.mapper.doValidation(null, true)).toBe(true);

      expect(errorCodes(account.mapper)).toEqual([
        ["Age", ValidationErrorCode.ValueRangeTooHigh],
        ["Name", ValidationErrorCode.CustomError],
      ]);
    });

    it("should call the local hook once per pass, stopped or not", () => {
      const hook = jest.fn();
      const mapper = new RowMapper({
        columns: [new StringColumn("Name", null, { isRequired: true })],
        localValidation: hook,
      });

      mapper.doValidation(null, true);

      expect(hook).toHaveBeenCalledTimes(1);
      expect(hook).toHaveBeenCalledWith(mapper);
      expect(errorCodes(mapper)).toEqual([["Name", ValidationErrorCode.ValueIsNotSet]]);
    });

    it("should refuse custom errors before the first pass", () => {
      expect(() => widget.mapper.addCustomValidationError("Name", "nope")).toThrow(
        "Initial validation not performed first"
      );
    });

    it("should refuse to validate without columns", () => {
      expect(() => new RowMapper().doValidation()).toThrow(ConfigurationError);
    });
  });

  describe("queryInsertInto()", () => {
    beforeEach(() => {
      widget.mapper.setColumnString("Name", "abc");
      widget.mapper.setColumnInteger("Age", 5);
    });

    it("should insert every column except the identity", async () => {
      await widget.mapper.queryInsertInto(db);

      expect(db.newQueryCalls).toBe(1);
      expect(db.lastQuery()).toEqual({
        sql: 'insert into "widgets" ("Name","Age") values (?,?)',
        params: [
          { type: SqlDataType.String, value: "abc" },
          { type: SqlDataType.Integer, value: 5 },
        ],
      });
    });

    it("should leave out skipped keys", async () => {
      await widget.mapper.queryInsertInto(db, { skipKeys: ["Age"] });

      expect(db.lastQuery().sql).toBe('insert into "widgets" ("Name") values (?)');
    });

    it("should insert into another table when given one", async () => {
      await widget.mapper.queryInsertInto(db, { tableName: "widgets_archive" });

      expect(db.lastQuery().sql).toBe(
        'insert into "widgets_archive" ("Name","Age") values (?,?)'
      );
    });
  });

  describe("queryUpdate()", () => {
    beforeEach(() => {
      widget.mapper.setColumnInteger("Id", 7);
      widget.mapper.setColumnString("Name", "abc");
      widget.mapper.setColumnInteger("Age", 5);
    });

    it("should update the row matching the where column", async () => {
      await widget.mapper.queryUpdate(db, { whereColumn: "Id" });

      expect(db.lastQuery()).toEqual({
        sql: 'update "widgets" set "Name"=?,"Age"=? where "Id"=?',
        params: [
          { type: SqlDataType.String, value: "abc" },
          { type: SqlDataType.Integer, value: 5 },
          { type: SqlDataType.Integer, value: 7 },
        ],
      });
    });

    it("should update every row without a where column", async () => {
      await widget.mapper.queryUpdate(db);

      expect(db.lastQuery().sql).toBe('update "widgets" set "Name"=?,"Age"=?');
    });

    it("should throw for an unknown where column", async () => {
      await expect(widget.mapper.queryUpdate(db, { whereColumn: "Nope" })).rejects.toThrow(
        "Column does not exist: Nope"
      );
    });
  });

  describe("querySelect()", () => {
    let paints: RowMapper;

    beforeEach(() => {
      paints = paintMapper();
    });

    it("should select everything without a filter", async () => {
      db.rows = [{ Id: 1, Colour: "Red", Size: 2 }];

      const rows = await paints.querySelect(db);

      expect(rows).toEqual([{ Id: 1, Colour: "Red", Size: 2 }]);
      expect(db.lastQuery()).toEqual({ sql: 'select * from "paints"', params: [] });
    });

    it("should join distinct columns with and", async () => {
      await paints.querySelect(db, { where: whereFromMap({ Colour: "Red", Size: 2 }) });

      expect(db.lastQuery()).toEqual({
        sql: 'select * from "paints" where "Colour"=? and "Size"=?',
        params: [
          { type: SqlDataType.String, value: "Red" },
          { type: SqlDataType.Integer, value: 2 },
        ],
      });
    });

    it("should group several values of one column with or", async () => {
      await paints.querySelect(db, { where: whereFromMap({ Colour: ["Red", "Blue"] }) });

      expect(db.lastQuery()).toEqual({
        sql: 'select * from "paints" where ("Colour"=? or "Colour"=?)',
        params: [
          { type: SqlDataType.String, value: "Red" },
          { type: SqlDataType.String, value: "Blue" },
        ],
      });
    });

    it("should group with and when the control key says so", async () => {
      await paints.querySelect(db, {
        where: whereFromMap({ [WHERE_COMPARISON_KEY]: WHERE_AND, Colour: ["Red", "Blue"] }),
      });

      expect(db.lastQuery().sql).toBe(
        'select * from "paints" where ("Colour"=? and "Colour"=?)'
      );
    });

    it("should compare null with is NULL", async () => {
      await paints.querySelect(db, { where: whereFromMap({ Size: [1, null] }) });

      expect(db.lastQuery()).toEqual({
        sql: 'select * from "paints" where ("Size"=? or "Size" is NULL)',
        params: [{ type: SqlDataType.Integer, value: 1 }],
      });
    });

    it("should coerce filter values for the column type", async () => {
      await paints.querySelect(db, { where: whereFromMap({ Size: "3" }) });

      expect(db.lastQuery().params).toEqual([{ type: SqlDataType.Integer, value: 3 }]);
    });

    it("should select the remaining columns and order the rows", async () => {
      await paints.querySelect(db, {
        skipKeys: ["Size"],
        orderBy: orderFromMap({ Colour: true, Id: false }),
      });

      expect(db.lastQuery().sql).toBe(
        'select "Id","Colour" from "paints" order by "Colour" ASC, "Id" DESC'
      );
    });

    it("should throw for a where key the table does not have", async () => {
      await expect(
        paints.querySelect(db, { where: whereFromMap({ Shade: "x" }) })
      ).rejects.toThrow(ArgumentError);
    });

    it("should compare unknown columns of another table as strings", async () => {
      await paints.querySelect(db, {
        tableName: "archive",
        where: whereFromMap({ Shade: 5 }),
      });

      expect(db.lastQuery()).toEqual({
        sql: 'select * from "archive" where "Shade"=?',
        params: [{ type: SqlDataType.String, value: "5" }],
      });
    });
  });

  describe("queryDelete()", () => {
    it("should delete the matching rows", async () => {
      await paintMapper().queryDelete(db, { where: whereFromPairs(["Id", 3]) });

      expect(db.lastQuery()).toEqual({
        sql: 'delete from "paints" where "Id"=?',
        params: [{ type: SqlDataType.Integer, value: 3 }],
      });
    });

    it("should delete every row without a filter", async () => {
      await paintMapper().queryDelete(db);

      expect(db.lastQuery().sql).toBe('delete from "paints"');
    });

    it("should refuse a filter without conditions", async () => {
      const mapper = paintMapper();

      expect(() => whereFromMap({ Id: [] })).toThrow(ArgumentError);
      await expect(
        mapper.queryDelete(db, { where: { clauses: [], grouping: "or" } })
      ).rejects.toThrow("Where clause has no conditions");
      expect(db.queries).toEqual([]);
    });

    it("should need a table name", async () => {
      const mapper = new RowMapper({ columns: [new IntegerColumn("Id")] });

      await expect(mapper.queryDelete(db)).rejects.toThrow("Table name not set");

      await mapper.queryDelete(db, { tableName: "scratch" });
      expect(db.lastQuery().sql).toBe('delete from "scratch"');
    });
  });
});
