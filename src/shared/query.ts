export type ProjectQuery = {
  text: string;
  values: string[];
};

export type ProjectQueryOptions = {
  where?: string;
  umbrellaProjectIds: string[];
};

// AND binds tighter than OR: the status and EGA filters apply to the
// study-title branch only.
export const DEFAULT_PREDICATE =
  "p.tax_id = 2697049 OR sm.tax_id = 2697049 OR " +
  "(lower(s.study_title) LIKE '%sars%cov%2%' OR lower(s.study_title) LIKE '%covid%' " +
  "OR lower(s.study_title) LIKE '%coronavirus%' OR lower(s.study_title) LIKE '%severe acute respiratory%')" +
  " AND p.status_id NOT IN (3, 5)" +
  " AND (s.study_id NOT LIKE 'EGA%' AND s.project_id NOT LIKE 'EGA%')";

export const buildProjectQuery = ({ where, umbrellaProjectIds }: ProjectQueryOptions): ProjectQuery => {
  const values = [...umbrellaProjectIds];
  const placeholders = values.map((_, index) => `$${index + 1}`);
  const umbrellaFilter = placeholders.length > 0 ? `to_id IN (${placeholders.join(", ")})` : "FALSE";

  // The extra filter must restrict every branch of the default predicate.
  const extra = where?.trim();
  const whereClause = extra ? `(${DEFAULT_PREDICATE}) AND (${extra})` : DEFAULT_PREDICATE;

  const text = `
    SELECT d.meta_key AS datahub, l.to_id AS umbrella_project_id, p.project_id, p.first_created,
      s.study_id, s.study_title,
      COUNT(DISTINCT sm.sample_id)::int AS sample_count, COUNT(DISTINCT r.run_id)::int AS run_count,
      p.center_name, p.tax_id::text AS project_taxon_id, p.scientific_name AS project_scientific_name,
      sm.tax_id::text AS sample_taxon_id, sm.scientific_name AS sample_scientific_name,
      p.status_id AS project_status,
      AVG(e.status_id)::float8 AS experiment_status,
      AVG(sm.status_id)::float8 AS sample_status,
      AVG(r.status_id)::float8 AS run_status
    FROM study s
      JOIN project p ON s.project_id = p.project_id
      LEFT JOIN dcc_meta_key d ON d.project_id = p.project_id
      LEFT JOIN (SELECT * FROM ena_link WHERE ${umbrellaFilter}) l ON l.from_id = p.project_id
      JOIN experiment e ON e.study_id = s.study_id
      JOIN experiment_sample es ON es.experiment_id = e.experiment_id
      JOIN sample sm ON sm.sample_id = es.sample_id
      JOIN run r ON e.experiment_id = r.experiment_id
    WHERE ${whereClause}
    GROUP BY d.meta_key, l.to_id, p.project_id, p.first_created, s.study_id, s.study_title, p.center_name,
      p.tax_id, p.scientific_name, sm.tax_id, sm.scientific_name, p.status_id
    ORDER BY p.first_created DESC
  `;

  return { text, values };
};
