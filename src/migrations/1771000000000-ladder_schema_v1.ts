import { MigrationInterface, QueryRunner } from 'typeorm';

export class LadderSchemaV11771000000000 implements MigrationInterface {
  name = 'LadderSchemaV11771000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(
      `CREATE TABLE "players" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" character varying(80) NOT NULL,
        "rating" integer NOT NULL DEFAULT 1000,
        "winCount" integer NOT NULL DEFAULT 0,
        "lossCount" integer NOT NULL DEFAULT 0,
        "bonusGivenCount" integer NOT NULL DEFAULT 0,
        "bonusTakenCount" integer NOT NULL DEFAULT 0,
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_players" PRIMARY KEY ("id")
      )`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_players_name" ON "players" ("name")`,
    );

    await queryRunner.query(
      `CREATE TABLE "seasons" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" character varying(120) NOT NULL,
        "startDate" date NOT NULL,
        "endDate" date,
        "active" boolean NOT NULL DEFAULT false,
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_seasons" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_seasons_window" CHECK ("endDate" IS NULL OR "endDate" >= "startDate")
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_seasons_startDate" ON "seasons" ("startDate")`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_seasons_single_active" ON "seasons" ("active") WHERE "active" = true`,
    );

    await queryRunner.query(
      `CREATE TABLE "matches" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "sequence" SERIAL NOT NULL,
        "winnerId" uuid NOT NULL,
        "loserId" uuid NOT NULL,
        "seasonId" uuid NOT NULL,
        "date" date NOT NULL,
        "shutout" boolean NOT NULL DEFAULT false,
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_matches" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_matches_distinct_players" CHECK ("winnerId" <> "loserId"),
        CONSTRAINT "FK_matches_winnerId" FOREIGN KEY ("winnerId")
          REFERENCES "players"("id") ON DELETE RESTRICT,
        CONSTRAINT "FK_matches_loserId" FOREIGN KEY ("loserId")
          REFERENCES "players"("id") ON DELETE RESTRICT,
        CONSTRAINT "FK_matches_seasonId" FOREIGN KEY ("seasonId")
          REFERENCES "seasons"("id") ON DELETE RESTRICT
      )`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_matches_sequence" ON "matches" ("sequence")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_matches_date_sequence" ON "matches" ("date", "sequence")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_matches_seasonId_date" ON "matches" ("seasonId", "date")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_matches_winnerId" ON "matches" ("winnerId")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_matches_loserId" ON "matches" ("loserId")`,
    );

    await queryRunner.query(
      `CREATE TABLE "rating_history" (
        "matchId" uuid NOT NULL,
        "playerId" uuid NOT NULL,
        "seasonId" uuid NOT NULL,
        "matchDate" date NOT NULL,
        "matchSequence" integer NOT NULL,
        "rating" integer NOT NULL,
        CONSTRAINT "PK_rating_history" PRIMARY KEY ("matchId", "playerId"),
        CONSTRAINT "FK_rating_history_matchId" FOREIGN KEY ("matchId")
          REFERENCES "matches"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_rating_history_playerId" FOREIGN KEY ("playerId")
          REFERENCES "players"("id") ON DELETE CASCADE
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_rating_history_player_chronology" ON "rating_history" ("playerId", "matchDate", "matchSequence")`,
    );

    await queryRunner.query(
      `CREATE TABLE "season_snapshots" (
        "seasonId" uuid NOT NULL,
        "playerId" uuid NOT NULL,
        "rating" integer NOT NULL,
        "winCount" integer NOT NULL,
        "lossCount" integer NOT NULL,
        CONSTRAINT "PK_season_snapshots" PRIMARY KEY ("seasonId", "playerId"),
        CONSTRAINT "FK_season_snapshots_seasonId" FOREIGN KEY ("seasonId")
          REFERENCES "seasons"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_season_snapshots_playerId" FOREIGN KEY ("playerId")
          REFERENCES "players"("id") ON DELETE CASCADE
      )`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "season_snapshots"`);
    await queryRunner.query(
      `DROP INDEX "IDX_rating_history_player_chronology"`,
    );
    await queryRunner.query(`DROP TABLE "rating_history"`);
    await queryRunner.query(`DROP INDEX "IDX_matches_loserId"`);
    await queryRunner.query(`DROP INDEX "IDX_matches_winnerId"`);
    await queryRunner.query(`DROP INDEX "IDX_matches_seasonId_date"`);
    await queryRunner.query(`DROP INDEX "IDX_matches_date_sequence"`);
    await queryRunner.query(`DROP INDEX "UQ_matches_sequence"`);
    await queryRunner.query(`DROP TABLE "matches"`);
    await queryRunner.query(`DROP INDEX "UQ_seasons_single_active"`);
    await queryRunner.query(`DROP INDEX "IDX_seasons_startDate"`);
    await queryRunner.query(`DROP TABLE "seasons"`);
    await queryRunner.query(`DROP INDEX "UQ_players_name"`);
    await queryRunner.query(`DROP TABLE "players"`);
  }
}
